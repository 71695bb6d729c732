import type { ResolvedResource } from './DocumentStorage';
import type { EditIntent } from './EditIntent';
import { type ErrorPayload, PipelineError } from './errors';
import type { AmbiguityCandidate, ChangeFragment } from './IntentEvaluator';

export type PlanStatus = 'NEW' | 'PREVIEWED' | 'APPLIED' | 'REJECTED';

export type LocatorKind = 'path' | 'uri' | 'handle';

export interface Plan {
  planId: string;
  target: ResolvedResource;
  /** Handle the target was resolved through, or auto-registered under. */
  handleId?: string;
  locatorKind: LocatorKind;
  intent: EditIntent;
  summary: string;
  status: PlanStatus;
  createdAt: string;
  /** Version of the preview that gates apply; null until the first preview. */
  activePreviewVersion: number | null;
  rejectionReason?: string;
}

export interface Preview {
  previewId: string;
  planId: string;
  version: number;
  diff: ChangeFragment[];
  ambiguityCandidates: AmbiguityCandidate[];
  ambiguous: boolean;
  disambiguated: boolean;
  safetyScore: number;
  affectedNodes: number;
  totalNodes: number;
  /** Document revision the preview was computed against. */
  documentRevision: number;
  computedAt: string;
}

export interface ApplySummary {
  planId: string;
  status: 'APPLIED';
  summary: string;
  affectedNodes: number;
  changes: number;
  documentRevision: number;
  previewVersion: number;
  target: string;
  backupPath?: string;
  appliedAt: string;
}

export type ApplyOutcome =
  | { ok: true; result: ApplySummary }
  | { ok: false; error: ErrorPayload };

type PlanUpdate = Partial<Pick<Plan, 'status' | 'activePreviewVersion' | 'rejectionReason'>>;

/** Error for a plan that is in no state to do `action`. */
export function planStateError(plan: Plan, action: string): PipelineError {
  switch (plan.status) {
    case 'APPLIED':
      return new PipelineError('PLAN_ALREADY_APPLIED', `Plan ${plan.planId} was already applied`, {
        details: { planId: plan.planId, status: plan.status },
        hint: 'Create a new plan for further edits.',
      });
    case 'REJECTED':
      return new PipelineError('PLAN_REJECTED', `Plan ${plan.planId} was rejected and cannot ${action}`, {
        details: { planId: plan.planId, status: plan.status, reason: plan.rejectionReason ?? null },
        hint: 'Create a new plan.',
      });
    default:
      return new PipelineError('PREVIEW_REQUIRED', `Plan ${plan.planId} must be previewed before it can ${action}`, {
        details: { planId: plan.planId, status: plan.status, reason: 'missing' },
        hint: 'Call preview_edit first.',
      });
  }
}

/**
 * Plans, their previews and apply outcomes, keyed by opaque id.
 *
 * Records are frozen. A status change replaces the plan record and only
 * succeeds when the current status is one the caller expected.
 */
export class PlanStore {
  private readonly plans = new Map<string, Plan>();
  private readonly previews = new Map<string, Preview[]>();
  private readonly outcomes = new Map<string, ApplyOutcome>();

  create(plan: Plan): Plan {
    if (this.plans.has(plan.planId)) throw new Error(`Duplicate plan id ${plan.planId}`);
    const frozen = Object.freeze({ ...plan });
    this.plans.set(plan.planId, frozen);
    this.previews.set(plan.planId, []);
    return frozen;
  }

  get(planId: string): Plan {
    const plan = this.plans.get(planId);
    if (!plan) {
      throw new PipelineError('PLAN_NOT_FOUND', `Plan not found: ${planId}`, {
        details: { planId },
        hint: 'Create a plan with plan_edit.',
      });
    }
    return plan;
  }

  /** Compare-and-set: replace the plan only while its status is one of `expected`. */
  transition(planId: string, expected: readonly PlanStatus[], update: PlanUpdate, action: string): Plan {
    const current = this.get(planId);
    if (!expected.includes(current.status)) throw planStateError(current, action);
    const next = Object.freeze({ ...current, ...update });
    this.plans.set(planId, next);
    return next;
  }

  addPreview(preview: Preview): void {
    const list = this.previews.get(preview.planId);
    if (!list) throw new Error(`Unknown plan ${preview.planId}`);
    list.push(Object.freeze(preview));
  }

  nextPreviewVersion(planId: string): number {
    return (this.previews.get(planId)?.length ?? 0) + 1;
  }

  /** Every preview of the plan, oldest first. */
  listPreviews(planId: string): readonly Preview[] {
    return this.previews.get(planId) ?? [];
  }

  activePreview(plan: Plan): Preview | undefined {
    if (plan.activePreviewVersion === null) return undefined;
    return this.listPreviews(plan.planId).find((p) => p.version === plan.activePreviewVersion);
  }

  recordOutcome(planId: string, outcome: ApplyOutcome): void {
    this.outcomes.set(planId, outcome);
  }

  outcome(planId: string): ApplyOutcome | undefined {
    return this.outcomes.get(planId);
  }

  /** Plans on `canonicalKey` that may still be previewed or applied. */
  openPlans(canonicalKey: string): Plan[] {
    return [...this.plans.values()].filter(
      (plan) => plan.target.canonicalKey === canonicalKey && (plan.status === 'NEW' || plan.status === 'PREVIEWED'),
    );
  }

  countByStatus(): Record<PlanStatus, number> {
    const counts: Record<PlanStatus, number> = { NEW: 0, PREVIEWED: 0, APPLIED: 0, REJECTED: 0 };
    for (const plan of this.plans.values()) counts[plan.status]++;
    return counts;
  }
}
