import type { DocumentStorage, ResolvedResource } from './DocumentStorage';
import type { EditIntent } from './EditIntent';
import { cancelledError, throwIfCancelled } from './errors';
import { HwpxDocument } from './HwpxDocument';
import { type ChangeFragment, type Evaluation, evaluateIntent } from './IntentEvaluator';
import { describeResource } from './LocatorResolver';
import { createLogger } from './logger';

const log = createLogger('document');

export interface MutationResult {
  fragments: ChangeFragment[];
  affectedNodes: number;
}

export interface SaveResult {
  revision: number;
  bytes: number;
  backupPath?: string;
}

/** What the pipeline needs from the document library. */
export interface DocumentCollaborator {
  resolve(resource: ResolvedResource, signal?: AbortSignal): Promise<HwpxDocument>;
  /** Evaluate an intent without mutating the document. */
  diff(doc: HwpxDocument, intent: EditIntent): Evaluation;
  /** Stage the intent's change; nothing is visible until {@link save}. */
  apply(doc: HwpxDocument, intent: EditIntent): MutationResult;
  /** Write staged changes atomically and commit them. */
  save(doc: HwpxDocument, signal?: AbortSignal): Promise<SaveResult>;
  discard(doc: HwpxDocument): void;
  evict(canonicalKey: string): void;
  /** Drop every cached document. */
  clear(): void;
}

interface PendingLoad {
  promise: Promise<HwpxDocument>;
  controller: AbortController;
  waiters: number;
}

/**
 * Settle with `promise`, or fail CANCELLED as soon as `signal` aborts and
 * call `onCancel` once.
 */
function waitFor<T>(promise: Promise<T>, signal: AbortSignal | undefined, stage: string, onCancel: () => void): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      onCancel();
      reject(cancelledError(stage));
    };
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Opened documents cached per canonical resource, so every handle and plan
 * that points at one file shares one in-memory copy and one revision counter.
 *
 * The last revision of an evicted copy is remembered: a reload starts above
 * it, so a preview taken against the old copy always reads as stale.
 */
export class HwpxCollaborator implements DocumentCollaborator {
  private readonly documents = new Map<string, HwpxDocument>();
  private readonly loading = new Map<string, PendingLoad>();
  private readonly resources = new WeakMap<HwpxDocument, ResolvedResource>();
  private readonly lastRevisions = new Map<string, number>();

  constructor(private readonly storage: DocumentStorage) {}

  isCached(canonicalKey: string): boolean {
    return this.documents.has(canonicalKey);
  }

  resolve(resource: ResolvedResource, signal?: AbortSignal): Promise<HwpxDocument> {
    const key = resource.canonicalKey;
    const cached = this.documents.get(key);
    if (cached) return Promise.resolve(cached);
    if (signal?.aborted) return Promise.reject(cancelledError('loading the document'));

    // one load shared by every waiter; it is aborted only once all of them have gone
    let pending = this.loading.get(key);
    if (!pending || pending.controller.signal.aborted) pending = this.startLoad(resource);
    pending.waiters++;
    const load = pending;
    return waitFor(load.promise, signal, 'loading the document', () => {
      load.waiters--;
      if (load.waiters === 0) load.controller.abort();
    });
  }

  private startLoad(resource: ResolvedResource): PendingLoad {
    const key = resource.canonicalKey;
    const controller = new AbortController();
    const pending: PendingLoad = { promise: this.load(resource, controller.signal), controller, waiters: 0 };
    pending.promise = pending.promise.finally(() => {
      if (this.loading.get(key) === pending) this.loading.delete(key);
    });
    this.loading.set(key, pending);
    return pending;
  }

  private async load(resource: ResolvedResource, signal: AbortSignal): Promise<HwpxDocument> {
    const key = resource.canonicalKey;
    const data = await this.storage.read(resource, signal);
    throwIfCancelled(signal, 'loading the document');
    const doc = await HwpxDocument.load(data, (this.lastRevisions.get(key) ?? 0) + 1);
    this.documents.set(key, doc);
    this.resources.set(doc, resource);
    log.info('document loaded', {
      target: describeResource(resource),
      sections: doc.sectionCount,
      paragraphs: doc.paragraphs.length,
      tables: doc.tables.length,
    });
    return doc;
  }

  diff(doc: HwpxDocument, intent: EditIntent): Evaluation {
    return evaluateIntent(doc, intent);
  }

  apply(doc: HwpxDocument, intent: EditIntent): MutationResult {
    const evaluation = evaluateIntent(doc, intent);
    doc.stage(evaluation.patches);
    return { fragments: evaluation.fragments, affectedNodes: evaluation.affectedNodes };
  }

  async save(doc: HwpxDocument, signal?: AbortSignal): Promise<SaveResult> {
    const resource = this.resources.get(doc);
    if (!resource) throw new Error('Document was not opened through this collaborator');

    const data = await doc.serialize();
    await HwpxDocument.verifyPackage(data);
    throwIfCancelled(signal, 'saving the document');
    const written = await this.storage.write(resource, data, signal);
    doc.commitPending();
    log.info('document saved', { target: describeResource(resource), revision: doc.revision, bytes: data.length });
    return { revision: doc.revision, bytes: data.length, ...written };
  }

  discard(doc: HwpxDocument): void {
    doc.discardPending();
  }

  evict(canonicalKey: string): void {
    const doc = this.documents.get(canonicalKey);
    if (!doc) return;
    this.lastRevisions.set(canonicalKey, doc.revision);
    this.documents.delete(canonicalKey);
    log.debug('document evicted', { canonicalKey, revision: doc.revision });
  }

  clear(): void {
    for (const key of [...this.documents.keys()]) this.evict(key);
  }
}
