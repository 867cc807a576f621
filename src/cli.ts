#!/usr/bin/env node
/**
 * Chunk an extracted-text file and report chunk quality.
 *
 * Pages are separated by form feeds (as `pdftotext` writes them). Chunks are
 * written to `<OUTPUT_DIR>/<name>.chunks.jsonl`; the analysis goes to the log.
 *
 * Usage:
 *   boundary-chunker <file.txt> [--compare]
 *
 * Configuration comes from CHUNK_SIZE, CHUNK_OVERLAP, MIN_CHUNK_SIZE,
 * MAX_CHUNK_SIZE, OUTPUT_DIR and LOG_PATH.
 */

import { basename, extname } from "node:path";
import { pathToFileURL } from "node:url";
import { compareSplitters, formatAnalysis } from "./core/analysis";
import { configFromEnv } from "./core/config";
import { getEnv } from "./core/env";
import { readFileContents, saveJsonl } from "./core/file-utils";
import { chunkDocument } from "./core/ingest";
import { Logger } from "./core/logger";
import type { DocumentPage } from "./types/document";
import type { ILogger } from "./types/logger";

export const USAGE = "Usage: boundary-chunker <file.txt> [--compare]";

/** Splits extracted text into 1-based pages on form feeds. */
export function toPages(raw: string): DocumentPage[] {
  return raw.split("\f").map((text, i) => ({ text, page: i + 1 }));
}

/**
 * Runs the CLI against `args` (without the node and script entries) and returns
 * the exit code.
 */
export async function runCli(args: string[], logger: ILogger): Promise<number> {
  const compare = args.includes("--compare");
  const files = args.filter((a) => !a.startsWith("--"));
  if (files.length !== 1) {
    logger.error(USAGE);
    return 1;
  }

  const [file] = files;
  const config = configFromEnv();
  const raw = readFileContents(file);

  const result = await chunkDocument({ logger }, { source: basename(file), pages: toPages(raw) }, config);
  for (const line of formatAnalysis(result.analysis)) logger.info(line);

  const outputDir = getEnv("OUTPUT_DIR", "./output");
  saveJsonl(outputDir, `${basename(file, extname(file))}.chunks`, result.chunks, logger);

  if (compare) {
    const { boundary, fixed } = compareSplitters(raw.replace(/\f/g, "\n\n"), config);
    logger.attn("Boundary splitter");
    for (const line of formatAnalysis(boundary)) logger.info(line);
    logger.attn("Fixed-width splitter");
    for (const line of formatAnalysis(fixed)) logger.info(line);
  }
  return 0;
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  const logger = new Logger(`${getEnv("LOG_PATH", "./logs")}/chunker.md`);
  void runCli(process.argv.slice(2), logger)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error(err);
      process.exitCode = 1;
    })
    .finally(() => logger.close());
}
