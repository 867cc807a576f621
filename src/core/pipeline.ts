/**
 * Context-owned, stream-capable pipeline.
 *
 * - Steps are `(ctx) => (doc) => out`.
 * - The parent `pipeline<C, I>(ctx)` injects the SAME `ctx` into EVERY step.
 * - Type evolution: `addStep<N>() => Pipeline<C, I, N>`, and `run()` returns the final `N`.
 * - A step may pause the run by returning a `PipelineOutcome` with `done: false`.
 *   The ingest steps never pause; a throwing step is turned into an "error" pause.
 *   Pauses and `stream()` are exported for callers composing their own steps.
 */

export type MaybePromise<T> = T | Promise<T>;

export type PipelineOutcome<O> =
  | { done: true; value: O }
  | { done: false; reason: string; payload?: unknown };

export function isPipelineOutcome<T>(v: unknown): v is PipelineOutcome<T> {
  return typeof v === "object" && v !== null && "done" in v;
}

/**
 * A pipeline step is a function returning another function:
 *   (context) => (doc: I) => O | Outcome<O> | Promise<...>
 */
export type PipelineStep<I, O, C = unknown> =
  (context: C) => (doc: I) => MaybePromise<O | PipelineOutcome<O>>;

export type StreamEvent<T> =
  | { type: "pause";    step: number; doc: T; info: Extract<PipelineOutcome<T>, { done: false }> }
  | { type: "progress"; step: number; doc: T }
  | { type: "done" };

export interface PipelineOpts {
  logger?: { info?: (s: string) => void; error?: (e: unknown) => void };
}

/** Thrown by `run()` when a step pauses or fails. */
export class PipelineHaltError extends Error {
  constructor(readonly step: number, readonly reason: string, readonly payload?: unknown) {
    super(`Pipeline halted at step #${step + 1}: ${reason}`);
    this.name = "PipelineHaltError";
  }
}

/**
 * Public surface.
 * C = the context shape; I = the input doc type; T = the current doc type.
 */
export interface Pipeline<C, I, T> {
  addStep<N>(step: PipelineStep<T, N, C>): Pipeline<C, I, N>;
  run(doc: I): Promise<T>;
  stream(doc: I): AsyncGenerator<StreamEvent<unknown>, unknown, void>;
}

type AnyStep<C> = PipelineStep<unknown, unknown, C>;

/**
 * Factory — REQUIRES a context up front.
 * Every step in this pipeline will receive exactly this `ctx` instance.
 */
export function pipeline<C, I>(ctx: C, opts?: PipelineOpts): Pipeline<C, I, I> {
  const steps: AnyStep<C>[] = [];
  const log = opts?.logger ?? {};

  async function* stream(doc: I): AsyncGenerator<StreamEvent<unknown>, unknown, void> {
    let current: unknown = doc;

    for (let index = 0; index < steps.length; index++) {
      let res: unknown;
      try {
        res = await steps[index](ctx)(current);
      } catch (err) {
        log.error?.(err);
        res = { done: false, reason: "error", payload: err } satisfies PipelineOutcome<unknown>;
      }

      if (isPipelineOutcome<unknown>(res)) {
        if (!res.done) {
          yield { type: "pause", step: index, doc: current, info: res };
          return current;
        }
        current = res.value;
      } else {
        current = res;
      }

      yield { type: "progress", step: index, doc: current };
    }

    yield { type: "done" };
    return current;
  }

  function build<T>(): Pipeline<C, I, T> {
    return {
      addStep<N>(step: PipelineStep<T, N, C>): Pipeline<C, I, N> {
        // stored type-erased; the chain of addStep generics keeps inputs and outputs aligned
        steps.push(step as unknown as AnyStep<C>);
        return build<N>();
      },

      async run(doc: I): Promise<T> {
        let current: unknown = doc;
        for await (const e of stream(doc)) {
          if (e.type === "pause") {
            throw new PipelineHaltError(e.step, e.info.reason, e.info.payload);
          }
          if (e.type === "progress") {
            log.info?.(`Pipeline: step #${e.step + 1} complete`);
            current = e.doc;
          }
        }
        return current as T;
      },

      stream,
    };
  }

  return build<I>();
}
