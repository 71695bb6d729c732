import {
  ErrorCode,
  type ListResourcesResult,
  type ListResourceTemplatesResult,
  McpError,
  type ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { EditPipeline, ResourceView } from './EditPipeline';
import { isPipelineError, mcpCodeFor } from './errors';

const RESOURCE_URI = /^hwpx:\/\/documents\/([A-Za-z0-9_-]+)\/(metadata|paragraphs|tables)$/;

const VIEWS: Array<{ view: ResourceView; label: string; description: string }> = [
  { view: 'metadata', label: 'metadata', description: 'Document metadata and structure counts' },
  { view: 'paragraphs', label: 'paragraphs', description: 'Text of every top-level paragraph' },
  { view: 'tables', label: 'tables', description: 'Table sizes and cell text' },
];

export function resourceUri(handleId: string, view: ResourceView): string {
  return `hwpx://documents/${handleId}/${view}`;
}

export function parseResourceUri(uri: string): { handleId: string; view: ResourceView } {
  const match = RESOURCE_URI.exec(uri.trim());
  const view = VIEWS.find((v) => v.view === match?.[2]);
  if (!match || !view) {
    throw new McpError(ErrorCode.InvalidParams, `Unsupported resource URI: ${uri}`);
  }
  return { handleId: match[1], view: view.view };
}

export function listResources(pipeline: EditPipeline): ListResourcesResult {
  return {
    resources: pipeline.listDocuments().handles.flatMap((handle) =>
      VIEWS.map(({ view, label, description }) => ({
        uri: resourceUri(handle.handleId, view),
        name: `${handle.handleId}-${view}`,
        title: `${handle.locator} ${label}`,
        description,
        mimeType: 'application/json',
      })),
    ),
  };
}

export function listResourceTemplates(): ListResourceTemplatesResult {
  return {
    resourceTemplates: VIEWS.map(({ view, description }) => ({
      uriTemplate: `hwpx://documents/{handleId}/${view}`,
      name: `document-${view}`,
      description: `${description} of an open document handle`,
      mimeType: 'application/json',
    })),
  };
}

export async function readResource(pipeline: EditPipeline, uri: string, signal?: AbortSignal): Promise<ReadResourceResult> {
  const { handleId, view } = parseResourceUri(uri);
  try {
    const payload = await pipeline.readView(handleId, view, signal);
    return { contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(payload, null, 2) }] };
  } catch (err) {
    if (isPipelineError(err, 'HANDLE_NOT_FOUND')) {
      throw new McpError(mcpCodeFor(err.code), err.message, { error: 'HANDLE_NOT_FOUND', handleId });
    }
    if (isPipelineError(err)) {
      throw new McpError(mcpCodeFor(err.code), err.message, { error: err.code, ...err.details });
    }
    throw err;
  }
}
