import * as fs from 'fs/promises';
import * as path from 'path';
import { PipelineError, errorMessage, throwIfCancelled } from './errors';
import { createLogger } from './logger';

const log = createLogger('storage');

export interface LocalResource {
  kind: 'local';
  /** `file://` URL of the absolute path; identifies the document for locking and caching. */
  canonicalKey: string;
  path: string;
  /** Path relative to the sandbox root, for display. */
  displayPath: string;
}

export interface RemoteResource {
  kind: 'remote';
  canonicalKey: string;
  uri: string;
  backend: 'http';
}

export type ResolvedResource = LocalResource | RemoteResource;

export interface WriteResult {
  backupPath?: string;
}

export interface DocumentStorage {
  read(resource: ResolvedResource, signal?: AbortSignal): Promise<Buffer>;
  /** Replace the stored document with `data` in one step. */
  write(resource: ResolvedResource, data: Buffer, signal?: AbortSignal): Promise<WriteResult>;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export class LocalDocumentStorage {
  constructor(private readonly options: { autoBackup: boolean }) {}

  async read(resource: LocalResource): Promise<Buffer> {
    try {
      return await fs.readFile(resource.path);
    } catch (err) {
      if (hasCode(err, 'ENOENT')) {
        throw new PipelineError('DOCUMENT_NOT_FOUND', `Document not found: ${resource.displayPath}`, {
          details: { path: resource.displayPath },
        });
      }
      throw new PipelineError('STORAGE_ERROR', `Failed to read ${resource.displayPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async write(resource: LocalResource, data: Buffer, signal?: AbortSignal): Promise<WriteResult> {
    const target = resource.path;
    const tempPath = `${target}.tmp`;
    let backupPath: string | undefined;

    if (this.options.autoBackup) {
      try {
        await fs.copyFile(target, `${target}.bak`);
        backupPath = `${target}.bak`;
        log.info('created backup', { path: resource.displayPath, backup: path.basename(backupPath) });
      } catch (err) {
        if (!hasCode(err, 'ENOENT')) {
          throw new PipelineError('STORAGE_ERROR', `Failed to create backup: ${errorMessage(err)}`, { cause: err });
        }
      }
    }

    try {
      await fs.writeFile(tempPath, data);
      // last point where the target is still untouched
      throwIfCancelled(signal, 'replacing the document');
      await fs.rename(tempPath, target);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      if (err instanceof PipelineError) throw err;
      throw new PipelineError('STORAGE_ERROR', `Failed to save ${resource.displayPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return backupPath ? { backupPath } : {};
  }
}

export interface HttpStorageOptions {
  headers: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Documents addressed by an absolute http(s) URI: GET downloads the package,
 * PUT replaces it. Backups are left to the remote service.
 */
export class HttpDocumentStorage {
  constructor(private readonly options: HttpStorageOptions) {}

  private async request(
    uri: string,
    method: 'GET' | 'PUT',
    init: { body?: Buffer; headers?: Record<string, string> },
    signal?: AbortSignal,
  ): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = this.options.timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, this.options.timeoutMs);
    const forward = () => controller.abort();
    signal?.addEventListener('abort', forward, { once: true });

    try {
      return await fetch(uri, {
        method,
        body: init.body,
        headers: { ...this.options.headers, ...init.headers },
        signal: controller.signal,
      });
    } catch (err) {
      throwIfCancelled(signal, `${method} ${uri} completed`);
      if (timedOut) {
        throw new PipelineError('STORAGE_ERROR', `HTTP storage timed out after ${this.options.timeoutMs}ms`, {
          details: { uri },
          retryable: true,
        });
      }
      throw new PipelineError('STORAGE_ERROR', `HTTP storage request failed: ${errorMessage(err)}`, {
        details: { uri },
        retryable: true,
        cause: err,
      });
    } finally {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    }
  }

  async read(resource: RemoteResource, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.request(resource.uri, 'GET', {}, signal);
    if (response.status === 404) {
      throw new PipelineError('DOCUMENT_NOT_FOUND', `Document not found: ${resource.uri}`, {
        details: { uri: resource.uri },
      });
    }
    if (!response.ok) {
      throw new PipelineError('STORAGE_ERROR', `HTTP storage open failed: ${response.status} ${response.statusText}`, {
        details: { uri: resource.uri, status: response.status },
      });
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async write(resource: RemoteResource, data: Buffer, signal?: AbortSignal): Promise<WriteResult> {
    throwIfCancelled(signal, 'uploading the document');
    const response = await this.request(
      resource.uri,
      'PUT',
      { body: data, headers: { 'Content-Type': 'application/octet-stream' } },
      signal,
    );
    if (!response.ok) {
      throw new PipelineError('STORAGE_ERROR', `HTTP storage save failed: ${response.status} ${response.statusText}`, {
        details: { uri: resource.uri, status: response.status },
      });
    }
    return {};
  }
}

/** Routes each resource to the backend that owns it. */
export class RoutingDocumentStorage implements DocumentStorage {
  constructor(
    private readonly local: LocalDocumentStorage,
    private readonly http: HttpDocumentStorage,
  ) {}

  read(resource: ResolvedResource, signal?: AbortSignal): Promise<Buffer> {
    return resource.kind === 'local' ? this.local.read(resource) : this.http.read(resource, signal);
  }

  write(resource: ResolvedResource, data: Buffer, signal?: AbortSignal): Promise<WriteResult> {
    return resource.kind === 'local' ? this.local.write(resource, data, signal) : this.http.write(resource, data, signal);
  }
}
