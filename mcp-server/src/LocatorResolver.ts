import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import type { LocalResource, RemoteResource, ResolvedResource } from './DocumentStorage';
import { PipelineError } from './errors';
import type { Handle, HandleRegistry } from './HandleRegistry';

const nonBlank = z.string().trim().min(1);

export const locatorSchema = z.union([
  nonBlank,
  z.object({ path: nonBlank }).strict(),
  z.object({ uri: nonBlank, backend: z.literal('http').optional() }).strict(),
  z.object({ handleId: nonBlank }).strict(),
]);

export type Locator = z.infer<typeof locatorSchema>;

/** JSON schema advertised for locator arguments of the tools. */
export const LOCATOR_JSON_SCHEMA = {
  description:
    'Document reference: a path relative to the workspace root (string or {path}), a remote document {uri, backend?}, or an open handle {handleId}.',
  oneOf: [
    { type: 'string' },
    { type: 'object', properties: { path: { type: 'string' } }, required: ['path'], additionalProperties: false },
    {
      type: 'object',
      properties: { uri: { type: 'string' }, backend: { type: 'string', enum: ['http'] } },
      required: ['uri'],
      additionalProperties: false,
    },
    { type: 'object', properties: { handleId: { type: 'string' } }, required: ['handleId'], additionalProperties: false },
  ],
} as const;

export interface ResolvedTarget {
  resource: ResolvedResource;
  /** Handle the locator referred to, or the one auto-registration found or created. */
  handle?: Handle;
  created: boolean;
}

export interface LocatorResolverOptions {
  root: string;
  allowedOrigins: string[];
  autoRegisterHandles: boolean;
}

function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

async function realpathOrSelf(target: string): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return target;
    throw err;
  }
}

export function describeResource(resource: ResolvedResource): string {
  return resource.kind === 'local' ? resource.displayPath : resource.uri;
}

export class LocatorResolver {
  private rootReal: Promise<string> | undefined;

  constructor(
    private readonly registry: HandleRegistry,
    private readonly options: LocatorResolverOptions,
  ) {}

  get root(): string {
    return this.options.root;
  }

  parse(raw: unknown): Locator {
    const parsed = locatorSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineError('INVALID_LOCATOR', 'Locator must be exactly one of: path string, {path}, {uri, backend?}, {handleId}', {
        details: { received: raw ?? null },
      });
    }
    return parsed.data;
  }

  async resolve(raw: unknown): Promise<ResolvedTarget> {
    const locator = this.parse(raw);
    if (typeof locator !== 'string' && 'handleId' in locator) {
      const handle = this.registry.lookup(locator.handleId);
      return { resource: handle.resource, handle, created: false };
    }

    const resource = typeof locator === 'string' || 'path' in locator
      ? await this.resolvePath(typeof locator === 'string' ? locator : locator.path)
      : this.resolveUri(locator.uri);

    if (!this.options.autoRegisterHandles) {
      return { resource, handle: this.registry.findByKey(resource.canonicalKey), created: false };
    }
    // synchronous from here: two resolutions of the same file share one handle
    const { handle, created } = this.registry.register(resource);
    return { resource, handle, created };
  }

  private async resolvePath(userPath: string): Promise<LocalResource> {
    const root = this.options.root;
    const candidate = path.resolve(root, userPath);
    if (!isInside(root, candidate)) {
      throw new PipelineError('PATH_ESCAPES_ROOT', `Path '${userPath}' escapes the workspace root`, {
        details: { path: userPath },
      });
    }
    if (path.extname(candidate).toLowerCase() !== '.hwpx') {
      throw new PipelineError('INVALID_LOCATOR', `Only .hwpx documents are supported: ${userPath}`, {
        details: { path: userPath },
      });
    }

    this.rootReal ??= realpathOrSelf(root);
    const rootReal = await this.rootReal;
    const real = await realpathOrSelf(candidate);
    // symlinks are followed, so check containment again on the real path
    const resolved = real === candidate ? path.join(rootReal, path.relative(root, candidate)) : real;
    if (!isInside(rootReal, resolved)) {
      throw new PipelineError('PATH_ESCAPES_ROOT', `Path '${userPath}' escapes the workspace root`, {
        details: { path: userPath },
      });
    }

    return {
      kind: 'local',
      canonicalKey: pathToFileURL(resolved).href,
      path: resolved,
      displayPath: path.relative(rootReal, resolved).split(path.sep).join('/'),
    };
  }

  private resolveUri(uri: string): RemoteResource {
    let url: URL;
    try {
      url = new URL(uri);
    } catch {
      throw new PipelineError('INVALID_LOCATOR', `Invalid URI: ${uri}`, { details: { uri } });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new PipelineError('INVALID_LOCATOR', `Unsupported URI scheme '${url.protocol}'`, {
        details: { uri },
        hint: 'Remote documents must use http or https.',
      });
    }
    if (!this.options.allowedOrigins.includes(url.origin)) {
      throw new PipelineError('PATH_ESCAPES_ROOT', `Origin ${url.origin} is not an allowed remote origin`, {
        details: { uri, origin: url.origin },
        hint: 'Start the server with --remote-origin to allow it.',
      });
    }
    url.hash = '';
    return { kind: 'remote', canonicalKey: url.href, uri: url.href, backend: 'http' };
  }
}
