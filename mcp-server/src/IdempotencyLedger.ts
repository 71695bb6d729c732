import { PipelineError } from './errors';

export interface IdempotencyRecord<T> {
  idempotencyKey: string;
  planId: string;
  outcome: T;
  appliedAt: string;
}

export interface Reservation<T> {
  readonly idempotencyKey: string;
  /** Store the outcome. A key is recorded at most once. */
  complete(outcome: T): IdempotencyRecord<T>;
  /** Give the key back without recording anything. */
  release(): void;
}

export type LedgerEntry<T> =
  | { kind: 'replay'; record: IdempotencyRecord<T> }
  | { kind: 'reserved'; reservation: Reservation<T> };

/**
 * Apply outcomes by client-supplied key, kept for the process lifetime.
 * Check-and-reserve happens without an await in between, so two requests
 * carrying the same key can never both run the mutation.
 */
export class IdempotencyLedger<T> {
  private readonly records = new Map<string, IdempotencyRecord<T>>();
  private readonly inFlight = new Map<string, string>();

  get size(): number {
    return this.records.size;
  }

  get(idempotencyKey: string): IdempotencyRecord<T> | undefined {
    return this.records.get(idempotencyKey);
  }

  begin(idempotencyKey: string, planId: string): LedgerEntry<T> {
    const record = this.records.get(idempotencyKey);
    if (record) return { kind: 'replay', record };

    const holder = this.inFlight.get(idempotencyKey);
    if (holder !== undefined) {
      throw new PipelineError('BUSY', `An apply with idempotency key "${idempotencyKey}" is still running`, {
        details: { idempotencyKey, planId: holder },
        hint: 'Retry with the same idempotencyKey once it completes to receive its outcome.',
        retryable: true,
      });
    }
    this.inFlight.set(idempotencyKey, planId);

    let settled = false;
    return {
      kind: 'reserved',
      reservation: {
        idempotencyKey,
        complete: (outcome) => {
          if (settled) throw new Error(`Reservation for "${idempotencyKey}" already settled`);
          settled = true;
          this.inFlight.delete(idempotencyKey);
          const entry: IdempotencyRecord<T> = {
            idempotencyKey,
            planId,
            outcome,
            appliedAt: new Date().toISOString(),
          };
          this.records.set(idempotencyKey, Object.freeze(entry));
          return entry;
        },
        release: () => {
          if (settled) return;
          settled = true;
          this.inFlight.delete(idempotencyKey);
        },
      },
    };
  }
}
