import { randomUUID } from 'crypto';
import { describeIntent, parseIntent } from './EditIntent';
import { type LocatorResolver, describeResource } from './LocatorResolver';
import { createLogger } from './logger';
import type { LocatorKind, Plan, PlanStore } from './PlanStore';

const log = createLogger('plan');

function locatorKind(raw: unknown): LocatorKind {
  if (raw && typeof raw === 'object') {
    if ('handleId' in raw) return 'handle';
    if ('uri' in raw) return 'uri';
  }
  return 'path';
}

export class PlanBuilder {
  constructor(
    private readonly resolver: LocatorResolver,
    private readonly store: PlanStore,
  ) {}

  /**
   * Validate the intent and resolve the target now, so a bad request fails
   * here and not at apply time. The document itself is not read.
   */
  async plan(target: unknown, rawIntent: unknown): Promise<Plan> {
    const intent = parseIntent(rawIntent);
    const resolved = await this.resolver.resolve(target);

    const plan = this.store.create({
      planId: `plan_${randomUUID()}`,
      target: resolved.resource,
      handleId: resolved.handle?.handleId,
      locatorKind: locatorKind(target),
      intent,
      summary: `${describeIntent(intent)} in ${describeResource(resolved.resource)}`,
      status: 'NEW',
      createdAt: new Date().toISOString(),
      activePreviewVersion: null,
    });
    log.info('plan created', { planId: plan.planId, kind: intent.kind, target: describeResource(plan.target) });
    return plan;
  }
}
