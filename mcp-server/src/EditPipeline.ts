import { ApplyExecutor, type ApplyRequest, type ApplyResponse } from './ApplyExecutor';
import type { ServerConfig } from './config';
import {
  type DocumentStorage,
  HttpDocumentStorage,
  LocalDocumentStorage,
  RoutingDocumentStorage,
} from './DocumentStorage';
import { isPipelineError } from './errors';
import { type Handle, HandleRegistry } from './HandleRegistry';
import { type DocumentCollaborator, HwpxCollaborator } from './HwpxCollaborator';
import type { DocumentMetadata } from './HwpxDocument';
import { IdempotencyLedger } from './IdempotencyLedger';
import { KeyedMutex } from './KeyedMutex';
import { LocatorResolver, describeResource } from './LocatorResolver';
import { createLogger } from './logger';
import { PlanBuilder } from './PlanBuilder';
import { type ApplyOutcome, type Plan, PlanStore, type Preview } from './PlanStore';
import { PreviewEngine } from './PreviewEngine';

const log = createLogger('pipeline');

export type PipelineConfig = Pick<
  ServerConfig,
  'root' | 'autoRegisterHandles' | 'autoBackup' | 'safetyThreshold' | 'lockTimeoutMs' | 'remote'
>;

export interface PipelineDependencies {
  storage?: DocumentStorage;
  collaborator?: DocumentCollaborator;
  registry?: HandleRegistry;
}

export interface HandleView {
  handleId: string;
  locator: string;
  backend: 'local' | 'http';
  registeredAt: string;
  lastAccessedAt: string;
}

export interface SessionPolicy {
  autoRegisterHandles: boolean;
  dedupe: 'canonical-resource';
  scope: 'process';
  expiry: 'none';
}

export interface OpenedDocument {
  handleId: string;
  created: boolean;
  resource: { locator: string; backend: 'local' | 'http' };
  metadata: DocumentMetadata;
  revision: number;
}

export interface PlanStatusView {
  plan: Plan;
  previews: readonly Preview[];
  outcome: ApplyOutcome | null;
}

export type ResourceView = 'metadata' | 'paragraphs' | 'tables';

function handleView(handle: Handle): HandleView {
  return {
    handleId: handle.handleId,
    locator: describeResource(handle.resource),
    backend: handle.resource.kind === 'local' ? 'local' : 'http',
    registeredAt: handle.registeredAt,
    lastAccessedAt: handle.lastAccessedAt,
  };
}

/**
 * Wires the staged-edit components together. One instance serves every
 * transport session of the process.
 */
export class EditPipeline {
  readonly registry: HandleRegistry;
  readonly resolver: LocatorResolver;
  readonly store = new PlanStore();
  readonly ledger = new IdempotencyLedger<ApplyOutcome>();
  readonly collaborator: DocumentCollaborator;
  private readonly planBuilder: PlanBuilder;
  private readonly previewEngine: PreviewEngine;
  private readonly applyExecutor: ApplyExecutor;

  constructor(
    readonly config: PipelineConfig,
    deps: PipelineDependencies = {},
  ) {
    this.registry = deps.registry ?? new HandleRegistry();
    const storage = deps.storage ??
      new RoutingDocumentStorage(
        new LocalDocumentStorage({ autoBackup: config.autoBackup }),
        new HttpDocumentStorage({ headers: config.remote.headers, timeoutMs: config.remote.timeoutMs }),
      );
    this.collaborator = deps.collaborator ?? new HwpxCollaborator(storage);
    this.resolver = new LocatorResolver(this.registry, {
      root: config.root,
      allowedOrigins: config.remote.allowedOrigins,
      autoRegisterHandles: config.autoRegisterHandles,
    });

    const planLocks = new KeyedMutex();
    const documentLocks = new KeyedMutex();
    this.planBuilder = new PlanBuilder(this.resolver, this.store);
    this.previewEngine = new PreviewEngine(this.store, this.registry, this.collaborator, planLocks, {
      lockTimeoutMs: config.lockTimeoutMs,
    });
    this.applyExecutor = new ApplyExecutor(
      this.store,
      this.registry,
      this.collaborator,
      this.ledger,
      planLocks,
      documentLocks,
      { safetyThreshold: config.safetyThreshold, lockTimeoutMs: config.lockTimeoutMs },
    );

    this.registry.onClose((handle) => this.releaseDocument(handle.resource.canonicalKey));
  }

  get sessionPolicy(): SessionPolicy {
    return {
      autoRegisterHandles: this.config.autoRegisterHandles,
      dedupe: 'canonical-resource',
      scope: 'process',
      expiry: 'none',
    };
  }

  async openDocument(locator: unknown, signal?: AbortSignal): Promise<OpenedDocument> {
    const resolved = await this.resolver.resolve(locator);
    const { handle, created } = resolved.handle
      ? { handle: resolved.handle, created: resolved.created }
      : this.registry.register(resolved.resource);

    let metadata: DocumentMetadata;
    let revision: number;
    try {
      const doc = await this.collaborator.resolve(resolved.resource, signal);
      metadata = doc.getMetadata();
      revision = doc.revision;
    } catch (err) {
      // don't leave a handle behind for a document that can't be opened
      if (created) this.registry.close(handle.handleId);
      throw err;
    }

    log.info('document handle opened', { handleId: handle.handleId, created, target: describeResource(handle.resource) });
    const view = handleView(handle);
    return {
      handleId: handle.handleId,
      created,
      resource: { locator: view.locator, backend: view.backend },
      metadata,
      revision,
    };
  }

  listDocuments(): { handles: HandleView[]; sessionPolicy: SessionPolicy } {
    return { handles: this.registry.list().map(handleView), sessionPolicy: this.sessionPolicy };
  }

  closeDocument(handleId: string): { closed: boolean } {
    const closed = this.registry.close(handleId);
    if (closed) log.info('document handle closed', { handleId });
    return { closed };
  }

  plan(target: unknown, intent: unknown): Promise<Plan> {
    return this.planBuilder.plan(target, intent);
  }

  preview(planId: string, signal?: AbortSignal): Promise<Preview> {
    return this.previewEngine.preview(planId, signal);
  }

  async apply(request: ApplyRequest, signal?: AbortSignal): Promise<ApplyResponse> {
    try {
      return await this.applyExecutor.apply(request, signal);
    } finally {
      this.releasePlanDocument(request.planId);
    }
  }

  async discard(planId: string): Promise<Plan> {
    const plan = await this.applyExecutor.discard(planId);
    this.releaseDocument(plan.target.canonicalKey);
    return plan;
  }

  status(planId: string): PlanStatusView {
    const plan = this.store.get(planId);
    return { plan, previews: this.store.listPreviews(planId), outcome: this.store.outcome(planId) ?? null };
  }

  /** Read-only views backing the hwpx://documents/{handleId}/... resources. */
  async readView(handleId: string, view: ResourceView, signal?: AbortSignal): Promise<Record<string, unknown>> {
    const handle = this.registry.lookup(handleId);
    const doc = await this.collaborator.resolve(handle.resource, signal);
    switch (view) {
      case 'metadata':
        return {
          handleId,
          locator: describeResource(handle.resource),
          metadata: doc.getMetadata(),
          revision: doc.revision,
          sectionCount: doc.sectionCount,
          paragraphCount: doc.paragraphs.length,
          tableCount: doc.tables.length,
        };
      case 'paragraphs':
        return {
          handleId,
          paragraphs: doc.paragraphs.map((p) => ({
            paragraphIndex: p.paragraphIndex,
            sectionIndex: p.sectionIndex,
            text: p.text,
            ...(p.tableIndexes.length > 0 ? { tableIndexes: p.tableIndexes } : {}),
          })),
        };
      case 'tables':
        return {
          handleId,
          tables: doc.tables.map((t) => ({
            tableIndex: t.tableIndex,
            sectionIndex: t.sectionIndex,
            rowCount: t.rowCount,
            colCount: t.colCount,
            cells: t.cells.map((row) => row.map((cell) => cell.text)),
          })),
        };
    }
  }

  private releasePlanDocument(planId: string): void {
    try {
      this.releaseDocument(this.store.get(planId).target.canonicalKey);
    } catch (err) {
      if (!isPipelineError(err, 'PLAN_NOT_FOUND')) throw err;
    }
  }

  /**
   * Drop the cached copy once nothing can reach it: no open handle and no plan
   * that could still be previewed or applied. Plans made through a handle die
   * with it, so they don't count.
   */
  private releaseDocument(canonicalKey: string): void {
    if (this.registry.findByKey(canonicalKey)) return;
    const live = this.store.openPlans(canonicalKey).filter((plan) => plan.locatorKind !== 'handle');
    if (live.length > 0) return;
    this.collaborator.evict(canonicalKey);
  }

  shutdown(): void {
    const handles = this.registry.size;
    this.registry.clear();
    this.collaborator.clear();
    log.info('pipeline shut down', { closedHandles: handles, plans: this.store.countByStatus() });
  }
}
