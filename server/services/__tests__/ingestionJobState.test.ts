import { describe, it, expect } from 'vitest';
import { InvalidJobTransitionError } from '@shared/domain/errors';
import { assertTransition, canTransition, isTerminalState } from '../ingestionJobState';

describe('ingestion job state machine', () => {
  it('allows the forward path', () => {
    expect(canTransition('queued', 'parsing')).toBe(true);
    expect(canTransition('parsing', 'canonicalizing')).toBe(true);
    expect(canTransition('canonicalizing', 'persisting')).toBe(true);
    expect(canTransition('persisting', 'completed')).toBe(true);
  });

  it('lets working states fail and terminal states re-queue', () => {
    expect(canTransition('parsing', 'failed')).toBe(true);
    expect(canTransition('persisting', 'failed')).toBe(true);
    expect(canTransition('failed', 'queued')).toBe(true);
    expect(canTransition('completed', 'queued')).toBe(true);
  });

  it('rejects skipped or backward steps', () => {
    expect(canTransition('queued', 'completed')).toBe(false);
    expect(canTransition('queued', 'failed')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(() => assertTransition('parsing', 'persisting')).toThrow(InvalidJobTransitionError);
    expect(() => assertTransition('parsing', 'persisting')).toThrow('Ingestion job cannot move from parsing to persisting');
  });

  it('treats completed and failed as terminal', () => {
    expect(isTerminalState('completed')).toBe(true);
    expect(isTerminalState('failed')).toBe(true);
    expect(isTerminalState('persisting')).toBe(false);
  });
});
