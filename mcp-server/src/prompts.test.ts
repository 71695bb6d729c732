import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { getPrompt, listPrompts } from './prompts';

function lines(name: string, values: Record<string, string>): string[] {
  const content = getPrompt(name, values).messages[0].content;
  if (content.type !== 'text') throw new Error(`unexpected ${content.type} content`);
  return content.text.split('\n');
}

describe('prompts', () => {
  it('lists versioned workflow prompts', () => {
    const { prompts } = listPrompts();

    expect(prompts.map((p) => p.name)).toEqual(['staged_edit@v1', 'replace_text@v1', 'table_cell_update@v1']);
    expect(prompts[0].arguments?.map((a) => [a.name, a.required])).toEqual([
      ['path', true],
      ['change', true],
      ['idempotencyKey', false],
    ]);
  });

  it('fills the template with the arguments', () => {
    const text = lines('table_cell_update@v1', { path: 'report.hwpx', tableIndex: '0', row: '1', col: '2', text: 'Done' });

    expect(text[0]).toBe('Set cell (1, 2) of table 0 in the HWPX document report.hwpx to "Done".');
    expect(text[2]).toBe(
      '2) Call `plan_edit` with {"target": {"handleId": "<handleId>"}, "intent": {"kind": "update_table_cell", "tableIndex": 0, "row": 1, "col": 2, "text": "Done"}}.',
    );
  });

  it('uses the default of a missing optional argument', () => {
    const text = lines('staged_edit@v1', { path: 'report.hwpx', change: 'fix the year' });

    expect(text[0]).toBe('Make this change to the HWPX document report.hwpx: fix the year');
    expect(text[7]).toBe(
      '6) Once the user approves, call `apply_edit` with {"planId": "<planId>", "confirm": true, "idempotencyKey": "edit-1"}.',
    );
  });

  it('does not expand placeholders inside argument values', () => {
    const text = lines('replace_text@v1', { path: 'a.hwpx', find: '{path}', replace: 'y' });
    expect(text[0]).toBe('Replace "{path}" with "y" in the HWPX document a.hwpx.');
  });

  it('rejects missing, empty and malformed arguments', () => {
    expect(() => getPrompt('replace_text@v1', { path: 'a.hwpx', find: 'x' })).toThrow(
      'Prompt argument "replace" is required',
    );
    expect(() => getPrompt('staged_edit@v1', { path: '', change: 'x' })).toThrow('Prompt argument "path" is required');
    expect(() =>
      getPrompt('table_cell_update@v1', { path: 'a.hwpx', tableIndex: '0', row: 'one', col: '0', text: 'x' }),
    ).toThrow(expect.objectContaining({ code: ErrorCode.InvalidParams }));
    expect(() =>
      getPrompt('table_cell_update@v1', { path: 'a.hwpx', tableIndex: '0', row: 'one', col: '0', text: 'x' }),
    ).toThrow('Prompt argument "row" must match ^[0-9]+$');
  });

  it('rejects an unknown prompt', () => {
    expect(() => getPrompt('summary@v1')).toThrow('Unknown prompt: summary@v1');
  });
});
