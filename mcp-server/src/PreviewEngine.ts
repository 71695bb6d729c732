import { randomUUID } from 'crypto';
import { throwIfCancelled } from './errors';
import type { HandleRegistry } from './HandleRegistry';
import type { DocumentCollaborator } from './HwpxCollaborator';
import type { KeyedMutex } from './KeyedMutex';
import { createLogger } from './logger';
import { type Plan, type PlanStore, type Preview, planStateError } from './PlanStore';

const log = createLogger('preview');

export interface PreviewEngineOptions {
  lockTimeoutMs: number;
}

/** A plan resolved through a handle stops working once that handle is closed. */
export function checkHandle(registry: HandleRegistry, plan: Plan): void {
  if (plan.locatorKind === 'handle' && plan.handleId) registry.lookup(plan.handleId);
}

export class PreviewEngine {
  constructor(
    private readonly store: PlanStore,
    private readonly registry: HandleRegistry,
    private readonly collaborator: DocumentCollaborator,
    private readonly planLocks: KeyedMutex,
    private readonly options: PreviewEngineOptions,
  ) {}

  /**
   * Compute a new preview version for the plan and make it the active one.
   * Older versions stay listed for audit but no longer gate apply.
   */
  async preview(planId: string, signal?: AbortSignal): Promise<Preview> {
    this.store.get(planId);
    return this.planLocks.runExclusive(
      planId,
      async () => {
        const plan = this.store.get(planId);
        if (plan.status !== 'NEW' && plan.status !== 'PREVIEWED') throw planStateError(plan, 'be previewed');
        checkHandle(this.registry, plan);

        const doc = await this.collaborator.resolve(plan.target, signal);
        const evaluation = this.collaborator.diff(doc, plan.intent);
        throwIfCancelled(signal, 'recording the preview');

        const version = this.store.nextPreviewVersion(planId);
        const preview: Preview = {
          previewId: `preview_${randomUUID()}`,
          planId,
          version,
          diff: evaluation.fragments,
          ambiguityCandidates: evaluation.candidates,
          ambiguous: evaluation.ambiguous,
          disambiguated: evaluation.disambiguated,
          safetyScore: evaluation.safetyScore,
          affectedNodes: evaluation.affectedNodes,
          totalNodes: evaluation.totalNodes,
          documentRevision: doc.revision,
          computedAt: new Date().toISOString(),
        };
        this.store.addPreview(preview);
        this.store.transition(planId, ['NEW', 'PREVIEWED'], { status: 'PREVIEWED', activePreviewVersion: version }, 'be previewed');
        log.info('preview computed', {
          planId,
          version,
          candidates: preview.ambiguityCandidates.length,
          ambiguous: preview.ambiguous,
          safetyScore: preview.safetyScore,
        });
        return preview;
      },
      { timeoutMs: this.options.lockTimeoutMs, label: `Plan ${planId}` },
    );
  }
}
