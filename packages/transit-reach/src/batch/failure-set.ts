/**
 * Failure Set
 *
 * Ordered record of batch items that produced no usable output, with the
 * reason for each. Members never contribute to a matrix or accumulator.
 */

import type { ItemError } from '../core/errors.js';

export interface FailureRecord {
  readonly key: string;
  /** Error code, e.g. REQUEST_FAILED */
  readonly code: string;
  /** Engine or transport status for request failures */
  readonly status: string | null;
  readonly message: string;
}

export interface ExclusionReport {
  readonly excluded: number;
  readonly total: number;
  /** 0 to 100, rounded to two decimals */
  readonly percentage: number;
  readonly message: string;
}

export class FailureSet {
  private readonly records = new Map<string, FailureRecord>();

  get size(): number {
    return this.records.size;
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  add(key: string, error: ItemError): void {
    this.records.set(key, {
      key,
      code: error.code,
      status: error.code === 'REQUEST_FAILED' ? error.status : null,
      message: error.message,
    });
  }

  keys(): string[] {
    return [...this.records.keys()];
  }

  list(): FailureRecord[] {
    return [...this.records.values()];
  }

  /**
   * "X out of Y <noun> excluded (P%)"
   */
  report(total: number, noun = 'origins'): ExclusionReport {
    const excluded = this.records.size;
    const percentage = total > 0 ? Math.round((excluded / total) * 10_000) / 100 : 0;
    return {
      excluded,
      total,
      percentage,
      message: `${excluded} out of ${total} ${noun} excluded (${percentage}%)`,
    };
  }
}
