// src/tests/env.test.ts
import { beforeEach, describe, expect, it } from "vitest";
import { getEnv, setEnv } from "../core/env";

// Simulate the std-env internal object
import { env as stdEnv } from "std-env";

describe("env module", () => {
  beforeEach(() => {
    delete stdEnv.OUTPUT_DIR;
  });

  describe("getEnv", () => {
    it("returns existing env value", () => {
      stdEnv.OUTPUT_DIR = "value";
      expect(getEnv("OUTPUT_DIR")).toBe("value");
    });

    it("returns default when env is missing", () => {
      expect(getEnv("OUTPUT_DIR", "default")).toBe("default");
    });

    it("throws when key is missing and no default", () => {
      expect(() => getEnv("OUTPUT_DIR")).toThrow("Missing environment variable: OUTPUT_DIR");
    });
  });

  describe("setEnv", () => {
    it("sets an environment key and returns true", () => {
      expect(setEnv("OUTPUT_DIR", "newValue")).toBe(true);
      expect(stdEnv.OUTPUT_DIR).toBe("newValue");
    });

    it("can be read back via getEnv", () => {
      setEnv("OUTPUT_DIR", "roundtrip");
      expect(getEnv("OUTPUT_DIR")).toBe("roundtrip");
    });
  });
});
