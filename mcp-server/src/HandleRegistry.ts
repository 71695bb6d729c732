import { randomUUID } from 'crypto';
import type { ResolvedResource } from './DocumentStorage';
import { PipelineError } from './errors';

export interface Handle {
  handleId: string;
  resource: ResolvedResource;
  registeredAt: string;
  lastAccessedAt: string;
}

export type HandleCloseListener = (handle: Handle) => void;

/**
 * Process-wide table of open documents, passed to whoever needs it.
 *
 * One handle per canonical resource: registering a resource that already has
 * a handle returns that handle. All methods are synchronous, so a mutation is
 * never observed half-done by a concurrent request.
 */
export class HandleRegistry {
  private readonly handles = new Map<string, Handle>();
  private readonly byKey = new Map<string, string>();
  private readonly closeListeners: HandleCloseListener[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  get size(): number {
    return this.handles.size;
  }

  onClose(listener: HandleCloseListener): void {
    this.closeListeners.push(listener);
  }

  register(resource: ResolvedResource): { handle: Handle; created: boolean } {
    const existingId = this.byKey.get(resource.canonicalKey);
    const existing = existingId === undefined ? undefined : this.handles.get(existingId);
    if (existing) {
      existing.lastAccessedAt = this.now().toISOString();
      return { handle: existing, created: false };
    }

    const timestamp = this.now().toISOString();
    const handle: Handle = {
      handleId: `h_${randomUUID().replace(/-/g, '').slice(0, 16)}`,
      resource,
      registeredAt: timestamp,
      lastAccessedAt: timestamp,
    };
    this.handles.set(handle.handleId, handle);
    this.byKey.set(resource.canonicalKey, handle.handleId);
    return { handle, created: true };
  }

  /** Look a handle up and mark it used. */
  lookup(handleId: string): Handle {
    const handle = this.handles.get(handleId);
    if (!handle) {
      throw new PipelineError('HANDLE_NOT_FOUND', `Handle not found: ${handleId}`, {
        details: { handleId },
        hint: 'Open the document again with open_document_handle.',
      });
    }
    handle.lastAccessedAt = this.now().toISOString();
    return handle;
  }

  findByKey(canonicalKey: string): Handle | undefined {
    const handleId = this.byKey.get(canonicalKey);
    return handleId === undefined ? undefined : this.handles.get(handleId);
  }

  close(handleId: string): boolean {
    const handle = this.handles.get(handleId);
    if (!handle) return false;
    this.handles.delete(handleId);
    this.byKey.delete(handle.resource.canonicalKey);
    for (const listener of this.closeListeners) listener(handle);
    return true;
  }

  /** Handles in registration order. */
  list(): Handle[] {
    return Array.from(this.handles.values(), (handle) => ({ ...handle }));
  }

  clear(): void {
    for (const handleId of Array.from(this.handles.keys())) this.close(handleId);
  }
}
