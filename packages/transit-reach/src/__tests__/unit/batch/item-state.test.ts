import { describe, it, expect } from 'vitest';
import { isTerminalState, ItemStateTracker } from '../../../batch/item-state.js';

describe('ItemStateTracker', () => {
  it('starts every key as PENDING', () => {
    const tracker = new ItemStateTracker(['a', 'b']);
    expect(tracker.inState('PENDING')).toEqual(['a', 'b']);
  });

  it('follows the success and failure paths', () => {
    const tracker = new ItemStateTracker(['a', 'b']);
    tracker.transition('a', 'REQUESTING');
    tracker.transition('a', 'PARSED');
    tracker.transition('a', 'AGGREGATED');
    tracker.transition('b', 'REQUESTING');
    tracker.transition('b', 'FAILED');
    tracker.transition('b', 'SKIPPED');

    expect(tracker.get('a')).toBe('AGGREGATED');
    expect(tracker.get('b')).toBe('SKIPPED');
  });

  it('rejects transitions outside the lifecycle', () => {
    const tracker = new ItemStateTracker(['a']);
    tracker.transition('a', 'REQUESTING');

    expect(() => tracker.transition('a', 'AGGREGATED')).toThrow(
      'Illegal state transition for a: REQUESTING → AGGREGATED'
    );
  });

  it('has no retry edge out of FAILED', () => {
    const tracker = new ItemStateTracker(['a']);
    tracker.transition('a', 'REQUESTING');
    tracker.transition('a', 'FAILED');

    expect(() => tracker.transition('a', 'REQUESTING')).toThrow(/FAILED → REQUESTING/);
  });

  it('returns an independent snapshot', () => {
    const tracker = new ItemStateTracker(['a']);
    const snapshot = tracker.snapshot();
    tracker.transition('a', 'REQUESTING');

    expect(snapshot.get('a')).toBe('PENDING');
  });
});

describe('isTerminalState', () => {
  it('treats AGGREGATED, FAILED and SKIPPED as terminal', () => {
    expect(isTerminalState('AGGREGATED')).toBe(true);
    expect(isTerminalState('FAILED')).toBe(true);
    expect(isTerminalState('SKIPPED')).toBe(true);
    expect(isTerminalState('PARSED')).toBe(false);
  });
});
