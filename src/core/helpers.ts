/**
 * Helpers for the context-based pipeline, matching the exact step shape:
 *   PipelineStep<I, O, C> = (ctx: C) => (doc: I) => O | PipelineOutcome<O>
 */

import type { PipelineStep } from "./pipeline";

/** Side-effect without changing the document (identity). */
export function tap<T, C>(sideEffect: (ctx: C, doc: T) => void): PipelineStep<T, T, C> {
  return (ctx) => (doc) => {
    sideEffect(ctx, doc);
    return doc;
  };
}

