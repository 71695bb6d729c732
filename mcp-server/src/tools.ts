import type { CallToolResult, ListToolsResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { EditPipeline } from './EditPipeline';
import { type ErrorPayload, PipelineError, isPipelineError } from './errors';
import { LOCATOR_JSON_SCHEMA } from './LocatorResolver';
import { createLogger } from './logger';

const log = createLogger('tools');

const INTENT_JSON_SCHEMA = {
  type: 'object',
  description:
    'Edit to perform. kind is one of replace_text {find, replace, regex?, caseSensitive?, scope?: {paragraphIndex | tableIndex}, occurrence?, matchAll?}, ' +
    'update_paragraph {paragraphIndex, text}, insert_paragraph {afterIndex (-1 = beginning), text}, ' +
    'delete_paragraph {paragraphIndex}, update_table_cell {tableIndex, row, col, text}. Indexes are 0-based across the whole document.',
  properties: {
    kind: {
      type: 'string',
      enum: ['replace_text', 'update_paragraph', 'insert_paragraph', 'delete_paragraph', 'update_table_cell'],
    },
  },
  required: ['kind'],
} as const;

const planIdSchema = { planId: { type: 'string', description: 'Plan ID from plan_edit' } } as const;

export const tools: Tool[] = [
  // === Handles ===
  {
    name: 'open_document_handle',
    description: 'Open an HWPX document and return a handle that later calls and resources can refer to',
    inputSchema: {
      type: 'object',
      properties: { locator: LOCATOR_JSON_SCHEMA },
      required: ['locator'],
    },
  },
  {
    name: 'list_open_documents',
    description: 'List open document handles in registration order, with the session policy',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'close_document_handle',
    description: 'Close a document handle',
    inputSchema: {
      type: 'object',
      properties: { handleId: { type: 'string', description: 'Handle ID from open_document_handle' } },
      required: ['handleId'],
    },
  },

  // === Staged edits ===
  {
    name: 'plan_edit',
    description: 'Declare an edit against a document. Nothing changes until the plan is previewed and applied.',
    inputSchema: {
      type: 'object',
      properties: { target: LOCATOR_JSON_SCHEMA, intent: INTENT_JSON_SCHEMA },
      required: ['target', 'intent'],
    },
  },
  {
    name: 'preview_edit',
    description: 'Compute the diff, ambiguity candidates and safety score of a plan. Required before apply_edit; calling again replaces the active preview.',
    inputSchema: { type: 'object', properties: planIdSchema, required: ['planId'] },
  },
  {
    name: 'apply_edit',
    description: 'Apply a previewed plan and save the document',
    inputSchema: {
      type: 'object',
      properties: {
        ...planIdSchema,
        confirm: { type: 'boolean', description: 'Must be true' },
        idempotencyKey: { type: 'string', description: 'Retrying with the same key returns the first outcome instead of applying again' },
        override: { type: 'boolean', description: 'Apply even when the safety score exceeds the threshold (default: false)' },
      },
      required: ['planId', 'confirm'],
    },
  },
  {
    name: 'discard_edit',
    description: 'Abandon a plan that has not been applied',
    inputSchema: { type: 'object', properties: planIdSchema, required: ['planId'] },
  },
  {
    name: 'get_edit_status',
    description: 'Show a plan with its preview history and apply outcome',
    inputSchema: { type: 'object', properties: planIdSchema, required: ['planId'] },
  },
];

const planIdArgs = z.object({ planId: z.string().min(1) });

const argSchemas = {
  open_document_handle: z.object({ locator: z.unknown() }),
  list_open_documents: z.object({}),
  close_document_handle: z.object({ handleId: z.string().min(1) }),
  plan_edit: z.object({ target: z.unknown(), intent: z.unknown() }),
  preview_edit: planIdArgs,
  apply_edit: z.object({
    planId: z.string().min(1),
    confirm: z.boolean().default(false),
    idempotencyKey: z.string().min(1).optional(),
    override: z.boolean().optional(),
  }),
  discard_edit: planIdArgs,
  get_edit_status: planIdArgs,
};

type ToolName = keyof typeof argSchemas;

/**
 * tools/list from the offset in `cursor`. The table is small enough to send
 * whole, so there is never a next page; an unreadable cursor starts over.
 */
export function listTools(cursor?: string): ListToolsResult {
  const start = cursor !== undefined && /^\d+$/.test(cursor) ? Number(cursor) : 0;
  return { tools: tools.slice(start) };
}

export type ToolErrorPayload = ErrorPayload & { candidates?: unknown; signal?: string };

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(argSchemas, name);
}

function parseArgs<T extends z.ZodTypeAny>(name: ToolName, schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new PipelineError('INVALID_ARGUMENTS', `Invalid arguments for ${name}`, {
      details: { issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) },
    });
  }
  return parsed.data;
}

function success(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function error(payload: ToolErrorPayload): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }], isError: true };
}

export function errorPayload(err: unknown): ToolErrorPayload {
  if (isPipelineError(err)) {
    const payload: ToolErrorPayload = err.toPayload();
    // surfaced at the top level so a client can pick one without digging
    if (err.code === 'AMBIGUOUS_TARGET' && err.details) payload.candidates = err.details.candidates;
    return payload;
  }
  return { errorCode: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) };
}

async function dispatch(pipeline: EditPipeline, name: ToolName, args: unknown, signal?: AbortSignal): Promise<CallToolResult> {
  switch (name) {
    case 'open_document_handle': {
      const { locator } = parseArgs(name, argSchemas.open_document_handle, args);
      return success(await pipeline.openDocument(locator, signal));
    }

    case 'list_open_documents':
      parseArgs(name, argSchemas.list_open_documents, args);
      return success(pipeline.listDocuments());

    case 'close_document_handle': {
      const { handleId } = parseArgs(name, argSchemas.close_document_handle, args);
      return success(pipeline.closeDocument(handleId));
    }

    case 'plan_edit': {
      const { target, intent } = parseArgs(name, argSchemas.plan_edit, args);
      const plan = await pipeline.plan(target, intent);
      return success({
        planId: plan.planId,
        summary: plan.summary,
        status: plan.status,
        ...(plan.handleId ? { handleId: plan.handleId } : {}),
      });
    }

    case 'preview_edit': {
      const { planId } = parseArgs(name, argSchemas.preview_edit, args);
      const preview = await pipeline.preview(planId, signal);
      return success({
        planId,
        previewId: preview.previewId,
        previewVersion: preview.version,
        diff: preview.diff,
        ambiguityCandidates: preview.ambiguityCandidates,
        ambiguous: preview.ambiguous,
        safetyScore: preview.safetyScore,
        safetyThreshold: pipeline.config.safetyThreshold,
        affectedNodes: preview.affectedNodes,
        totalNodes: preview.totalNodes,
        documentRevision: preview.documentRevision,
      });
    }

    case 'apply_edit': {
      const request = parseArgs(name, argSchemas.apply_edit, args);
      const { outcome, replayed } = await pipeline.apply(request, signal);
      const signalField = replayed ? { signal: 'IDEMPOTENT_REPLAY' } : {};
      return outcome.ok
        ? success({ result: outcome.result, ...signalField })
        : error({ ...outcome.error, ...signalField });
    }

    case 'discard_edit': {
      const { planId } = parseArgs(name, argSchemas.discard_edit, args);
      const plan = await pipeline.discard(planId);
      return success({ planId: plan.planId, status: plan.status });
    }

    case 'get_edit_status': {
      const { planId } = parseArgs(name, argSchemas.get_edit_status, args);
      return success(pipeline.status(planId));
    }
  }
}

export async function handleToolCall(
  pipeline: EditPipeline,
  name: string,
  args: unknown,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  if (!isToolName(name)) {
    return error({ errorCode: 'INVALID_ARGUMENTS', message: `Unknown tool: ${name}` });
  }
  try {
    return await dispatch(pipeline, name, args, signal);
  } catch (err) {
    if (isPipelineError(err)) {
      log.debug('tool call failed', { tool: name, errorCode: err.code, message: err.message });
    } else {
      log.error('tool call crashed', { tool: name, err });
    }
    return error(errorPayload(err));
  }
}
