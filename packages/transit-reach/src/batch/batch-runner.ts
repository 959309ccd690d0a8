/**
 * Batch Runner
 *
 * Sequential loop driver shared by the isochrone, intersection, trip and
 * choropleth runs. One item at a time; the next item starts only after the
 * previous body settled.
 *
 * PROGRESS:
 * After each success or failure: "N out of T <noun> complete. Time taken E
 * seconds. Estimated time left is approx. R seconds.", where
 * R = mean(elapsed) × T − sum(elapsed). Dropped items shrink T.
 *
 * CANCELLATION:
 * `signal` is checked between items. A cancelled run returns its summary with
 * `cancelled: true`; the body is expected to forward the signal to its
 * request.
 */

import { createLogger, type LoggerLike } from '../core/utils/logger.js';

const defaultLogger = createLogger({ module: 'batch' });

/**
 * Per-item result reported by the loop body
 */
export type ItemOutcome =
  | { readonly status: 'success' }
  | { readonly status: 'failure'; readonly reason: string }
  | { readonly status: 'dropped'; readonly reason: string };

export const SUCCESS: ItemOutcome = { status: 'success' };

export function failure(reason: string): ItemOutcome {
  return { status: 'failure', reason };
}

export function dropped(reason: string): ItemOutcome {
  return { status: 'dropped', reason };
}

export interface BatchProgress {
  /** Successes plus failures so far */
  readonly completed: number;
  /** Items minus drops so far */
  readonly total: number;
  readonly elapsedSeconds: number;
  /** `null` once the last item completed */
  readonly remainingSeconds: number | null;
  readonly message: string;
}

export interface BatchOptions {
  /** Plural noun used in progress messages */
  readonly noun?: string;
  readonly signal?: AbortSignal;
  /** Called after every success or failure; a throw aborts the run */
  readonly onProgress?: (progress: BatchProgress) => void | Promise<void>;
  /** Clock in milliseconds */
  readonly now?: () => number;
  readonly logger?: LoggerLike;
}

export interface BatchSummary {
  readonly items: number;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly dropped: number;
  readonly cancelled: boolean;
  /** Seconds per completed (non-dropped) item, in run order */
  readonly elapsed: readonly number[];
  readonly totalSeconds: number;
}

/**
 * Run `body` over `items` in order
 */
export async function forEach<T>(
  items: readonly T[],
  body: (item: T, index: number) => Promise<ItemOutcome>,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const noun = options.noun ?? 'items';
  const now = options.now ?? Date.now;
  const log = options.logger ?? defaultLogger;

  const elapsed: number[] = [];
  let total = items.length;
  let succeeded = 0;
  let failed = 0;
  let droppedCount = 0;
  let cancelled = false;

  for (let index = 0; index < items.length; index++) {
    if (options.signal?.aborted) {
      cancelled = true;
      log.warn('Batch cancelled', { completed: succeeded + failed, total });
      break;
    }

    const started = now();
    const outcome = await body(items[index], index);
    const seconds = (now() - started) / 1000;

    if (outcome.status === 'dropped') {
      droppedCount++;
      total--;
      log.info(`Dropped ${singular(noun)}: ${outcome.reason}`);
      continue;
    }

    if (outcome.status === 'success') {
      succeeded++;
    } else {
      failed++;
    }
    elapsed.push(seconds);

    const progress = computeProgress(elapsed, total, noun);
    log.info(progress.message);
    await options.onProgress?.(progress);
  }

  return {
    items: items.length,
    total,
    succeeded,
    failed,
    dropped: droppedCount,
    cancelled,
    elapsed,
    totalSeconds: sum(elapsed),
  };
}

/**
 * Progress after `elapsed.length` completed items out of `total`
 */
export function computeProgress(
  elapsed: readonly number[],
  total: number,
  noun: string
): BatchProgress {
  const completed = elapsed.length;
  const elapsedSeconds = sum(elapsed);
  const remainingSeconds =
    completed < total ? Math.max(0, (elapsedSeconds / completed) * total - elapsedSeconds) : null;

  return {
    completed,
    total,
    elapsedSeconds,
    remainingSeconds,
    message: formatProgressMessage(completed, total, noun, elapsedSeconds, remainingSeconds),
  };
}

export function formatProgressMessage(
  completed: number,
  total: number,
  noun: string,
  elapsedSeconds: number,
  remainingSeconds: number | null
): string {
  const head = `${completed} out of ${total} ${noun} complete. Time taken ${round2(elapsedSeconds)} seconds.`;
  if (remainingSeconds === null) {
    return head;
  }
  return `${head} Estimated time left is approx. ${round2(remainingSeconds)} seconds.`;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function singular(noun: string): string {
  return noun.endsWith('s') ? noun.slice(0, -1) : noun;
}
