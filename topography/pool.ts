import pLimit from "p-limit";
import { classify, formatError, type PipelineError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";

export type TaskOutcome<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: PipelineError };

export type BatchSummary = {
  processed: number;
  failed: number;
};

export type BatchResult<T, R> = {
  outcomes: TaskOutcome<T, R>[];
  summary: BatchSummary;
};

export type BatchOptions<T> = {
  jobs: number;
  /** Path or id used when reporting a failed task. */
  label: (item: T) => string;
  logger?: Logger;
};

/**
 * Runs `worker` over `items` with at most `jobs` tasks in flight. A task that
 * throws is logged and counted as failed; its siblings keep running. Outcomes
 * come back in input order.
 */
export async function runBatch<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  opts: BatchOptions<T>,
): Promise<BatchResult<T, R>> {
  const log = opts.logger ?? createLogger("pool");
  const limit = pLimit(Math.max(1, opts.jobs));

  const outcomes = await Promise.all(
    items.map((item) =>
      limit(async (): Promise<TaskOutcome<T, R>> => {
        try {
          return { item, ok: true, value: await worker(item) };
        } catch (e) {
          const error = classify(e, opts.label(item));
          log.error(formatError(error));
          return { item, ok: false, error };
        }
      }),
    ),
  );

  const fatal = outcomes.find((o) => !o.ok && o.error.fatal);
  if (fatal && !fatal.ok) throw fatal.error;

  const failed = outcomes.filter((o) => !o.ok).length;
  return { outcomes, summary: { processed: outcomes.length - failed, failed } };
}

export function formatSummary(stage: string, summary: BatchSummary): string {
  return `${stage}: processed ${summary.processed}, failed ${summary.failed}`;
}
