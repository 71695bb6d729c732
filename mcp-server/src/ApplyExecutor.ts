import { type ErrorPayload, PipelineError, errorMessage, isPipelineError, throwIfCancelled } from './errors';
import type { HandleRegistry } from './HandleRegistry';
import type { DocumentCollaborator } from './HwpxCollaborator';
import type { IdempotencyLedger, Reservation } from './IdempotencyLedger';
import type { KeyedMutex } from './KeyedMutex';
import { describeResource } from './LocatorResolver';
import { createLogger } from './logger';
import { checkHandle } from './PreviewEngine';
import { type ApplyOutcome, type Plan, type PlanStore, planStateError } from './PlanStore';

const log = createLogger('apply');

export interface ApplyRequest {
  planId: string;
  confirm: boolean;
  idempotencyKey?: string;
  /** Accept a preview whose safety score is above the threshold. */
  override?: boolean;
}

export interface ApplyResponse {
  outcome: ApplyOutcome;
  /** True when the outcome was recorded by an earlier request with the same key. */
  replayed: boolean;
}

export interface ApplyExecutorOptions {
  safetyThreshold: number;
  lockTimeoutMs: number;
}

export class ApplyExecutor {
  constructor(
    private readonly store: PlanStore,
    private readonly registry: HandleRegistry,
    private readonly collaborator: DocumentCollaborator,
    private readonly ledger: IdempotencyLedger<ApplyOutcome>,
    private readonly planLocks: KeyedMutex,
    private readonly documentLocks: KeyedMutex,
    private readonly options: ApplyExecutorOptions,
  ) {}

  async apply(request: ApplyRequest, signal?: AbortSignal): Promise<ApplyResponse> {
    const { planId, idempotencyKey } = request;
    let reservation: Reservation<ApplyOutcome> | undefined;
    if (idempotencyKey) {
      // check and reserve before the first await
      const entry = this.ledger.begin(idempotencyKey, planId);
      if (entry.kind === 'replay') {
        log.info('idempotent replay', { planId, idempotencyKey, recordedFor: entry.record.planId });
        return { outcome: entry.record.outcome, replayed: true };
      }
      reservation = entry.reservation;
    }

    try {
      const plan = this.store.get(planId);
      const outcome = await this.planLocks.runExclusive(
        planId,
        () =>
          this.documentLocks.runExclusive(
            plan.target.canonicalKey,
            () => this.gateAndMutate(request, reservation, signal),
            { timeoutMs: this.options.lockTimeoutMs, label: describeResource(plan.target) },
          ),
        { timeoutMs: this.options.lockTimeoutMs, label: `Plan ${planId}` },
      );
      return { outcome, replayed: false };
    } catch (err) {
      // a request that never reached the mutation leaves the key unused
      reservation?.release();
      throw err;
    }
  }

  private async gateAndMutate(
    request: ApplyRequest,
    reservation: Reservation<ApplyOutcome> | undefined,
    signal?: AbortSignal,
  ): Promise<ApplyOutcome> {
    const plan = this.store.get(request.planId);
    if (plan.status !== 'PREVIEWED') throw planStateError(plan, 'be applied');
    const preview = this.store.activePreview(plan);
    if (!preview) throw planStateError({ ...plan, status: 'NEW' }, 'be applied');
    checkHandle(this.registry, plan);

    const doc = await this.collaborator.resolve(plan.target, signal);
    if (doc.revision !== preview.documentRevision) {
      throw new PipelineError('PREVIEW_REQUIRED', 'The document changed after the active preview was computed', {
        details: {
          planId: plan.planId,
          reason: 'stale',
          previewVersion: preview.version,
          previewRevision: preview.documentRevision,
          documentRevision: doc.revision,
        },
        hint: 'Call preview_edit again and review the new diff.',
      });
    }
    if (preview.ambiguous) {
      throw new PipelineError('AMBIGUOUS_TARGET', `The selector matches ${preview.ambiguityCandidates.length} locations`, {
        details: {
          planId: plan.planId,
          previewVersion: preview.version,
          candidates: preview.ambiguityCandidates,
        },
        hint: 'Create a new plan with occurrence, matchAll or a narrower scope.',
      });
    }
    if (preview.safetyScore > this.options.safetyThreshold && request.override !== true) {
      throw new PipelineError('UNSAFE_WILDCARD', 'The change affects more of the document than the safety threshold allows', {
        details: {
          planId: plan.planId,
          safetyScore: preview.safetyScore,
          safetyThreshold: this.options.safetyThreshold,
          affectedNodes: preview.affectedNodes,
          totalNodes: preview.totalNodes,
        },
        hint: 'Review the preview and pass override: true to apply anyway.',
      });
    }
    if (request.confirm !== true) {
      throw new PipelineError('CONFIRMATION_REQUIRED', 'apply_edit needs confirm: true', {
        details: { planId: plan.planId },
      });
    }
    throwIfCancelled(signal, 'applying the plan');

    try {
      const mutation = this.collaborator.apply(doc, plan.intent);
      const saved = await this.collaborator.save(doc, signal);
      const applied = this.store.transition(plan.planId, ['PREVIEWED'], { status: 'APPLIED' }, 'be applied');
      const outcome: ApplyOutcome = {
        ok: true,
        result: {
          planId: plan.planId,
          status: 'APPLIED',
          summary: applied.summary,
          affectedNodes: mutation.affectedNodes,
          changes: mutation.fragments.length,
          documentRevision: saved.revision,
          previewVersion: preview.version,
          target: describeResource(plan.target),
          ...(saved.backupPath ? { backupPath: saved.backupPath } : {}),
          appliedAt: new Date().toISOString(),
        },
      };
      this.finish(plan, outcome, reservation);
      log.info('plan applied', { planId: plan.planId, revision: saved.revision, idempotencyKey: request.idempotencyKey });
      return outcome;
    } catch (err) {
      this.collaborator.discard(doc);
      if (isPipelineError(err, 'CANCELLED')) throw err;

      const error: ErrorPayload = {
        errorCode: 'APPLY_FAILED',
        message: `Applying plan ${plan.planId} failed: ${errorMessage(err)}`,
        details: {
          planId: plan.planId,
          cause: isPipelineError(err) ? err.toPayload() : { message: errorMessage(err) },
        },
        hint: 'The document was left unchanged. Create a new plan to try again.',
      };
      this.store.transition(plan.planId, ['PREVIEWED'], { status: 'REJECTED', rejectionReason: error.message }, 'be applied');
      const outcome: ApplyOutcome = { ok: false, error };
      this.finish(plan, outcome, reservation);
      log.error('apply failed', { planId: plan.planId, err });
      return outcome;
    }
  }

  private finish(plan: Plan, outcome: ApplyOutcome, reservation: Reservation<ApplyOutcome> | undefined): void {
    this.store.recordOutcome(plan.planId, outcome);
    reservation?.complete(outcome);
  }

  /** Abandon a plan that will not be applied. */
  async discard(planId: string): Promise<Plan> {
    this.store.get(planId);
    return this.planLocks.runExclusive(
      planId,
      async () => {
        const plan = this.store.get(planId);
        if (plan.status !== 'NEW' && plan.status !== 'PREVIEWED') throw planStateError(plan, 'be discarded');
        const discarded = this.store.transition(
          planId,
          ['NEW', 'PREVIEWED'],
          { status: 'REJECTED', rejectionReason: 'discarded by client' },
          'be discarded',
        );
        log.info('plan discarded', { planId });
        return discarded;
      },
      { timeoutMs: this.options.lockTimeoutMs, label: `Plan ${planId}` },
    );
  }
}
