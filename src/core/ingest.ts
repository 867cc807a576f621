// ingest.ts — per-document chunking pipeline
import { pipeline, type PipelineStep } from "./pipeline";
import { tap } from "./helpers";
import { analyzeChunks } from "./analysis";
import { splitNormalized } from "./chunker";
import { validateConfig } from "./config";
import { normalize } from "./normalizer";
import type { ChunkerConfig, ChunkerContext } from "../types/chunker";
import type {
  AnnotatedDoc,
  DocState,
  DocumentChunk,
  DocumentInput,
  DocumentResult,
  NormalizedPages,
  SplitPages,
} from "../types/document";

/* ────────────────────────────────────────────────────────────────────────── */
/* Local type shorthands                                                      */
/* ────────────────────────────────────────────────────────────────────────── */
type Ctx = ChunkerContext;
type Step<I, O> = PipelineStep<I, O, Ctx>;

/* ────────────────────────────────────────────────────────────────────────── */
/* Steps                                                                      */
/* ────────────────────────────────────────────────────────────────────────── */

// 1) normalize every page on its own; empty pages drop out
export const sNormalize: Step<DocState, NormalizedPages> =
  (ctx) => (d) => {
    const pages = d.input.pages
      .map((p) => ({ ...p, text: normalize(p.text) }))
      .filter((p) => p.text.length > 0);
    if (pages.length < d.input.pages.length) {
      ctx.logger?.warn(`Ingest: ${d.input.source} has ${d.input.pages.length - pages.length} empty page(s)`);
    }
    return { ...d, pages };
  };

// 2) split pages
export const sSplit: Step<NormalizedPages, SplitPages> =
  () => (d) => ({ ...d, pageChunks: d.pages.map((p) => splitNormalized(p.text, d.config)) });

// 3) attach document metadata; chunkIndex runs across pages
export const sAnnotate: Step<SplitPages, AnnotatedDoc> =
  () => (d) => {
    const { source } = d.input;
    const chunks: DocumentChunk[] = [];
    d.pageChunks.forEach((pageChunks, i) => {
      const { page } = d.pages[i];
      for (const c of pageChunks) {
        chunks.push({
          ...c,
          metadata: {
            source,
            ...(page === undefined ? {} : { page }),
            chunkIndex: chunks.length,
            chunkSize: c.text.length,
            splitMethod: "boundary",
          },
        });
      }
    });
    return { input: d.input, config: d.config, chunks };
  };

// 4) quality stats
export const sAnalyze: Step<AnnotatedDoc, DocumentResult> =
  () => (d) => ({ source: d.input.source, chunks: d.chunks, analysis: analyzeChunks(d.chunks) });

/* ────────────────────────────────────────────────────────────────────────── */
/* Precomposed program                                                        */
/* ────────────────────────────────────────────────────────────────────────── */

export function buildDocumentPipeline(ctx: Ctx) {
  return pipeline<Ctx, DocState>(ctx, { logger: { error: (e) => ctx.logger?.error(e) } })
    .addStep(tap<DocState, Ctx>((c, d) => {
      c.logger?.info(`Ingest: start ${d.input.source} (${d.input.pages.length} page(s))`);
    }))
    .addStep(sNormalize)
    .addStep(sSplit)
    .addStep(sAnnotate)
    .addStep(sAnalyze)
    .addStep(tap<DocumentResult, Ctx>((c, r) => {
      c.logger?.info(`Ingest: done ${r.source} (${r.chunks.length} chunks)`);
    }));
}

/* ────────────────────────────────────────────────────────────────────────── */
/* Public API                                                                 */
/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Normalizes and splits each page of a document, then tags every chunk with
 * its source, page and document-wide index.
 *
 * @throws ConfigError before any page is touched.
 */
export async function chunkDocument(
  ctx: Ctx,
  input: DocumentInput,
  config: Readonly<ChunkerConfig>
): Promise<DocumentResult> {
  validateConfig(config);
  return buildDocumentPipeline(ctx).run({ input, config });
}

/**
 * Chunks independent documents concurrently. The config is validated once up front;
 * results keep the input order.
 */
export async function chunkDocuments(
  ctx: Ctx,
  inputs: DocumentInput[],
  config: Readonly<ChunkerConfig>
): Promise<DocumentResult[]> {
  validateConfig(config);
  const results = await Promise.all(inputs.map((input) => buildDocumentPipeline(ctx).run({ input, config })));
  ctx.logger?.impt(
    `Ingest: ${results.length} document(s), ${results.reduce((n, r) => n + r.chunks.length, 0)} chunks`
  );
  return results;
}
