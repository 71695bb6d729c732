import { describe, it, expect } from 'vitest';
import { IdempotencyLedger } from './IdempotencyLedger';

describe('IdempotencyLedger', () => {
  it('replays a completed key', () => {
    const ledger = new IdempotencyLedger<string>();
    const entry = ledger.begin('key-1', 'plan_a');
    if (entry.kind !== 'reserved') throw new Error('expected a reservation');
    entry.reservation.complete('applied');

    const again = ledger.begin('key-1', 'plan_b');
    expect(again.kind).toBe('replay');
    expect(again.kind === 'replay' && again.record).toMatchObject({
      idempotencyKey: 'key-1',
      planId: 'plan_a',
      outcome: 'applied',
    });
    expect(ledger.size).toBe(1);
  });

  it('fails BUSY while the key is in flight', () => {
    const ledger = new IdempotencyLedger<string>();
    ledger.begin('key-1', 'plan_a');

    expect(() => ledger.begin('key-1', 'plan_a')).toThrow(
      expect.objectContaining({ code: 'BUSY', retryable: true, details: { idempotencyKey: 'key-1', planId: 'plan_a' } }),
    );
  });

  it('frees a released key without recording it', () => {
    const ledger = new IdempotencyLedger<string>();
    const entry = ledger.begin('key-1', 'plan_a');
    if (entry.kind !== 'reserved') throw new Error('expected a reservation');
    entry.reservation.release();

    expect(ledger.get('key-1')).toBeUndefined();
    expect(ledger.begin('key-1', 'plan_a').kind).toBe('reserved');
  });

  it('settles a reservation once', () => {
    const ledger = new IdempotencyLedger<string>();
    const entry = ledger.begin('key-1', 'plan_a');
    if (entry.kind !== 'reserved') throw new Error('expected a reservation');
    entry.reservation.complete('first');
    entry.reservation.release();

    expect(() => entry.reservation.complete('second')).toThrow('Reservation for "key-1" already settled');
    expect(ledger.get('key-1')?.outcome).toBe('first');
  });
});
