/**
 * Batch Item State
 *
 * Lifecycle of one origin (or origin × query time) inside a batch:
 *
 *   PENDING → REQUESTING → PARSED → AGGREGATED
 *                        ↘ FAILED → SKIPPED
 *
 * AGGREGATED contributed to the output. FAILED and SKIPPED are excluded and
 * the batch continues. There is no retry edge.
 */

export type ItemState =
  | 'PENDING'
  | 'REQUESTING'
  | 'PARSED'
  | 'FAILED'
  | 'AGGREGATED'
  | 'SKIPPED';

const TRANSITIONS: Readonly<Record<ItemState, readonly ItemState[]>> = {
  PENDING: ['REQUESTING', 'SKIPPED'],
  REQUESTING: ['PARSED', 'FAILED'],
  PARSED: ['AGGREGATED', 'SKIPPED'],
  FAILED: ['SKIPPED'],
  AGGREGATED: [],
  SKIPPED: [],
};

export function isTerminalState(state: ItemState): boolean {
  return state === 'AGGREGATED' || state === 'SKIPPED' || state === 'FAILED';
}

/**
 * Tracks item states in insertion order and rejects illegal transitions
 */
export class ItemStateTracker {
  private readonly states = new Map<string, ItemState>();

  constructor(keys: Iterable<string> = []) {
    for (const key of keys) {
      this.states.set(key, 'PENDING');
    }
  }

  get(key: string): ItemState | undefined {
    return this.states.get(key);
  }

  transition(key: string, next: ItemState): void {
    const current = this.states.get(key) ?? 'PENDING';
    if (!TRANSITIONS[current].includes(next)) {
      throw new Error(`Illegal state transition for ${key}: ${current} → ${next}`);
    }
    this.states.set(key, next);
  }

  /**
   * Keys currently in `state`
   */
  inState(state: ItemState): string[] {
    return [...this.states.entries()].filter(([, value]) => value === state).map(([key]) => key);
  }

  snapshot(): ReadonlyMap<string, ItemState> {
    return new Map(this.states);
  }
}
