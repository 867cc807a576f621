import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ILogger } from "../types/logger";

/**
 * Ensures that the specified directory exists, creating it if necessary.
 *
 * @param dirPath - The path of the directory to ensure existence.
 * @param logger - Logger instance used to log information about directory creation.
 */
export function ensureDirectory(dirPath: string, logger: ILogger): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
    logger.impt(`Created output directory: ${dirPath}`);
  }
}

/**
 * Reads the contents of a file at the specified path as UTF-8. Errors from
 * the file system propagate.
 */
export function readFileContents(filePath: string): string {
  return readFileSync(filePath, "utf-8");
}

/**
 * Saves an array of items as a JSONL file, one JSON value per line, and
 * returns the path written.
 *
 * @param directory - Where the output file should be written; created if missing.
 * @param filename - Output filename; '.jsonl' is appended when missing.
 */
export function saveJsonl(
  directory: string,
  filename: string,
  items: unknown[],
  logger: ILogger
): string {
  let outputFile = filename.endsWith(".jsonl") ? filename : `${filename}.jsonl`;
  if (directory) {
    ensureDirectory(directory, logger);
    outputFile = join(directory, outputFile);
  }
  const outputContent = items.map((item) => JSON.stringify(item)).join("\n");
  writeFileSync(outputFile, outputContent, "utf-8");
  logger.impt(`Saved ${items.length} item(s) to ${outputFile}`);
  return outputFile;
}
