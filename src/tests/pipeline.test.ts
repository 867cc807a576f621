import { describe, expect, it, vi } from "vitest";
import { PipelineHaltError, isPipelineOutcome, pipeline, type PipelineStep } from "../core/pipeline";
import { tap } from "../core/helpers";
import { MockLogger } from "./logger.mock";

type Ctx = { logger: MockLogger };
type Doc = { v: number };

const ctx: Ctx = { logger: new MockLogger() };

describe("pipeline", () => {
  it("run processes steps and returns final doc", async () => {
    const p = pipeline<Ctx, Doc>(ctx)
      .addStep(() => (d) => ({ v: d.v + 1 }))
      .addStep(() => (d) => ({ v: d.v * 2 }));

    expect(await p.run({ v: 2 })).toEqual({ v: 6 });
  });

  it("unwraps a finished outcome and awaits async steps", async () => {
    const p = pipeline<Ctx, Doc>(ctx)
      .addStep<Doc>(() => (d) => ({ done: true, value: { v: d.v + 10 } }))
      .addStep(() => async (d) => ({ v: d.v + 1 }));

    expect(await p.run({ v: 0 })).toEqual({ v: 11 });
  });

  it("passes the same context to every step", async () => {
    const seen: Ctx[] = [];
    const record: PipelineStep<Doc, Doc, Ctx> = (c) => (d) => {
      seen.push(c);
      return d;
    };
    await pipeline<Ctx, Doc>(ctx).addStep(record).addStep(record).run({ v: 1 });
    expect(seen).toEqual([ctx, ctx]);
    expect(seen[0]).toBe(ctx);
  });

  it("run rejects with PipelineHaltError when a step pauses", async () => {
    const after = vi.fn((d: Doc) => d);
    const pause: PipelineStep<Doc, Doc, Ctx> = () => async () => ({ done: false, reason: "hitl" });
    const p = pipeline<Ctx, Doc>(ctx)
      .addStep(() => (d) => ({ v: d.v + 1 }))
      .addStep(pause)
      .addStep(() => after);

    const err = await p.run({ v: 1 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PipelineHaltError);
    expect(err).toHaveProperty("step", 1);
    expect(err).toHaveProperty("reason", "hitl");
    expect(err).toHaveProperty("message", "Pipeline halted at step #2: hitl");
    expect(after).not.toHaveBeenCalled();
  });

  it("reports a throwing step to the error logger and halts", async () => {
    const boom = new Error("boom");
    const error = vi.fn();
    const p = pipeline<Ctx, Doc>(ctx, { logger: { error } }).addStep(() => () => {
      throw boom;
    });

    const err = await p.run({ v: 1 }).catch((e: unknown) => e);
    expect(error).toHaveBeenCalledWith(boom);
    expect(err).toBeInstanceOf(PipelineHaltError);
    expect(err).toHaveProperty("reason", "error");
    expect(err).toHaveProperty("payload", boom);
  });

  it("logs each completed step to the info logger", async () => {
    const info = vi.fn();
    await pipeline<Ctx, Doc>(ctx, { logger: { info } })
      .addStep(() => (d) => d)
      .addStep(() => (d) => d)
      .run({ v: 0 });
    expect(info.mock.calls).toEqual([["Pipeline: step #1 complete"], ["Pipeline: step #2 complete"]]);
  });

  it("stream yields progress per step, then done", async () => {
    const p = pipeline<Ctx, { s: string }>(ctx)
      .addStep(() => (d) => ({ s: d.s + "A" }))
      .addStep(() => (d) => ({ s: d.s + "B" }));

    const events: string[] = [];
    for await (const e of p.stream({ s: "X" })) {
      events.push(e.type === "progress" ? `progress:${JSON.stringify(e.doc)}` : e.type);
    }
    expect(events).toEqual(['progress:{"s":"XA"}', 'progress:{"s":"XAB"}', "done"]);
  });

  it("stream stops at a pause with the doc from before the step", async () => {
    const pause: PipelineStep<Doc, Doc, Ctx> = () => () => ({ done: false, reason: "wait", payload: 7 });
    const p = pipeline<Ctx, Doc>(ctx)
      .addStep(() => (d) => ({ v: d.v + 1 }))
      .addStep(pause);

    const events = [];
    for await (const e of p.stream({ v: 1 })) events.push(e);
    expect(events[1]).toEqual({
      type: "pause",
      step: 1,
      doc: { v: 2 },
      info: { done: false, reason: "wait", payload: 7 },
    });
    expect(events).toHaveLength(2);
  });
});

describe("isPipelineOutcome", () => {
  it("detects objects with a done flag", () => {
    expect(isPipelineOutcome({ done: true, value: 1 })).toBe(true);
    expect(isPipelineOutcome({ v: 1 })).toBe(false);
    expect(isPipelineOutcome(null)).toBe(false);
  });
});

describe("tap", () => {
  it("runs the side effect and passes the doc through", async () => {
    const seen: number[] = [];
    const out = await pipeline<Ctx, Doc>(ctx)
      .addStep(tap<Doc, Ctx>((_c, d) => seen.push(d.v)))
      .run({ v: 4 });
    expect(out).toEqual({ v: 4 });
    expect(seen).toEqual([4]);
  });
});
