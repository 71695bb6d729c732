import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EditPipeline } from './EditPipeline';
import { errorPayload, handleToolCall, listTools, tools } from './tools';
import { PipelineError } from './errors';
import { makeTempRoot, removeTempRoot, testConfig, writeHwpx } from './test-helpers';

describe('tools', () => {
  let root: string;
  let pipeline: EditPipeline;

  async function call(name: string, args?: Record<string, unknown>): Promise<{ isError: boolean; body: unknown }> {
    const result = await handleToolCall(pipeline, name, args);
    const first = result.content[0];
    if (first.type !== 'text') throw new Error(`unexpected ${first.type} content`);
    const body: unknown = JSON.parse(first.text);
    return { isError: result.isError === true, body };
  }

  async function field(name: string, args: Record<string, unknown>, key: string): Promise<string> {
    const { body } = await call(name, args);
    return stringField(body, key);
  }

  beforeEach(async () => {
    root = makeTempRoot();
    await writeHwpx(root, 'report.hwpx', [['Report 2025', 'Budget 2025 and 2026', 'None']]);
    pipeline = new EditPipeline(testConfig(root));
  });

  afterEach(() => {
    pipeline.shutdown();
    removeTempRoot(root);
  });

  it('advertises every tool with an object input schema', () => {
    expect(tools.map((t) => t.name)).toEqual([
      'open_document_handle',
      'list_open_documents',
      'close_document_handle',
      'plan_edit',
      'preview_edit',
      'apply_edit',
      'discard_edit',
      'get_edit_status',
    ]);
    expect(tools.every((t) => t.inputSchema.type === 'object')).toBe(true);
  });

  it('lists tools from a cursor offset', () => {
    expect(listTools().tools).toHaveLength(8);
    expect(listTools('3').tools.map((t) => t.name)).toEqual([
      'plan_edit',
      'preview_edit',
      'apply_edit',
      'discard_edit',
      'get_edit_status',
    ]);
    expect(listTools('next').tools).toHaveLength(8);
    expect(listTools('20').tools).toEqual([]);
    expect(listTools().nextCursor).toBeUndefined();
  });

  it('surfaces ambiguity candidates at the top level of the error', async () => {
    const handleId = await field('open_document_handle', { locator: 'report.hwpx' }, 'handleId');
    const planned = await call('plan_edit', {
      target: { handleId },
      intent: { kind: 'replace_text', find: '2025', replace: '2026' },
    });
    expect(planned.body).toMatchObject({
      summary: 'Replace "2025" with "2026" in report.hwpx',
      status: 'NEW',
      handleId,
    });
    const planId = stringField(planned.body, 'planId');

    const preview = await call('preview_edit', { planId });
    expect(preview.isError).toBe(false);
    expect(preview.body).toMatchObject({ planId, previewVersion: 1, ambiguous: true, safetyThreshold: 0.5 });

    const applied = await call('apply_edit', { planId, confirm: true });
    expect(applied.isError).toBe(true);
    expect(applied.body).toMatchObject({
      errorCode: 'AMBIGUOUS_TARGET',
      message: 'The selector matches 2 locations',
      candidates: [{ candidateIndex: 0, match: '2025' }, { candidateIndex: 1, match: '2025' }],
    });
  });

  it('marks an idempotent replay', async () => {
    const planId = await field(
      'plan_edit',
      { target: 'report.hwpx', intent: { kind: 'update_paragraph', paragraphIndex: 2, text: 'Done' } },
      'planId',
    );
    await call('preview_edit', { planId });

    const first = await call('apply_edit', { planId, confirm: true, idempotencyKey: 'retry-1' });
    const second = await call('apply_edit', { planId, confirm: true, idempotencyKey: 'retry-1' });

    expect(first.isError).toBe(false);
    expect(first.body).not.toHaveProperty('signal');
    expect(second.body).toMatchObject({ signal: 'IDEMPOTENT_REPLAY', result: { planId, status: 'APPLIED' } });
  });

  it('defaults confirm to false', async () => {
    const planId = await field(
      'plan_edit',
      { target: 'report.hwpx', intent: { kind: 'delete_paragraph', paragraphIndex: 0 } },
      'planId',
    );
    await call('preview_edit', { planId });

    expect(await call('apply_edit', { planId })).toEqual({
      isError: true,
      body: { errorCode: 'CONFIRMATION_REQUIRED', message: 'apply_edit needs confirm: true', details: { planId } },
    });
  });

  it('validates arguments', async () => {
    expect(await call('preview_edit', {})).toEqual({
      isError: true,
      body: {
        errorCode: 'INVALID_ARGUMENTS',
        message: 'Invalid arguments for preview_edit',
        details: { issues: [{ path: 'planId', message: 'Required' }] },
      },
    });
    expect(await call('drop_tables')).toEqual({
      isError: true,
      body: { errorCode: 'INVALID_ARGUMENTS', message: 'Unknown tool: drop_tables' },
    });
  });

  it('lists, closes, discards and reports status', async () => {
    const handleId = await field('open_document_handle', { locator: { path: 'report.hwpx' } }, 'handleId');
    expect((await call('list_open_documents')).body).toMatchObject({
      handles: [{ handleId, locator: 'report.hwpx', backend: 'local' }],
      sessionPolicy: { dedupe: 'canonical-resource' },
    });

    const planId = await field(
      'plan_edit',
      { target: 'report.hwpx', intent: { kind: 'update_paragraph', paragraphIndex: 0, text: 'x' } },
      'planId',
    );
    expect((await call('discard_edit', { planId })).body).toEqual({ planId, status: 'REJECTED' });
    expect((await call('get_edit_status', { planId })).body).toMatchObject({
      plan: { planId, status: 'REJECTED', rejectionReason: 'discarded by client' },
      previews: [],
      outcome: null,
    });

    expect((await call('close_document_handle', { handleId })).body).toEqual({ closed: true });
    expect((await call('list_open_documents')).body).toMatchObject({ handles: [] });
  });

  it('maps unexpected errors to INTERNAL_ERROR', () => {
    expect(errorPayload(new Error('boom'))).toEqual({ errorCode: 'INTERNAL_ERROR', message: 'boom' });
    expect(errorPayload(new PipelineError('BUSY', 'busy', { retryable: true }))).toEqual({
      errorCode: 'BUSY',
      message: 'busy',
      retryable: true,
    });
  });
});

function stringField(body: unknown, key: string): string {
  if (body && typeof body === 'object') {
    const value: unknown = Object.entries(body).find(([name]) => name === key)?.[1];
    if (typeof value === 'string') return value;
  }
  throw new Error(`response has no ${key}`);
}
