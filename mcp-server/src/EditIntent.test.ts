import { describe, it, expect } from 'vitest';
import { compileSelector, describeIntent, parseIntent } from './EditIntent';

describe('parseIntent', () => {
  it('accepts every supported kind', () => {
    expect(parseIntent({ kind: 'replace_text', find: 'a', replace: 'b' }).kind).toBe('replace_text');
    expect(parseIntent({ kind: 'update_paragraph', paragraphIndex: 0, text: '' }).kind).toBe('update_paragraph');
    expect(parseIntent({ kind: 'insert_paragraph', afterIndex: -1, text: 'x' }).kind).toBe('insert_paragraph');
    expect(parseIntent({ kind: 'delete_paragraph', paragraphIndex: 2 }).kind).toBe('delete_paragraph');
    expect(parseIntent({ kind: 'update_table_cell', tableIndex: 0, row: 1, col: 1, text: 'x' }).kind).toBe(
      'update_table_cell',
    );
  });

  it('rejects an unknown kind and lists the supported ones', () => {
    expect(() => parseIntent({ kind: 'rename_document', name: 'x' })).toThrow(
      expect.objectContaining({
        code: 'UNSUPPORTED_INTENT',
        message: 'Unsupported intent kind: "rename_document"',
        details: {
          supportedKinds: ['replace_text', 'update_paragraph', 'insert_paragraph', 'delete_paragraph', 'update_table_cell'],
        },
      }),
    );
    expect(() => parseIntent('replace')).toThrow('Unsupported intent kind: null');
  });

  it('reports field problems of the requested kind only', () => {
    expect(() => parseIntent({ kind: 'replace_text', replace: 'x' })).toThrow(
      expect.objectContaining({
        code: 'UNSUPPORTED_INTENT',
        message: 'Invalid replace_text intent',
        details: { issues: [{ path: 'find', message: 'Required' }] },
      }),
    );
  });

  it('rejects occurrence together with matchAll', () => {
    expect(() => parseIntent({ kind: 'replace_text', find: 'a', replace: 'b', occurrence: 0, matchAll: true })).toThrow(
      expect.objectContaining({
        details: { issues: [{ path: '', message: 'occurrence and matchAll are mutually exclusive' }] },
      }),
    );
  });

  it('rejects negative indexes and unknown fields', () => {
    expect(() => parseIntent({ kind: 'update_paragraph', paragraphIndex: -1, text: 'x' })).toThrow(
      expect.objectContaining({
        details: { issues: [{ path: 'paragraphIndex', message: 'Number must be greater than or equal to 0' }] },
      }),
    );
    expect(() => parseIntent({ kind: 'delete_paragraph', paragraphIndex: 0, force: true })).toThrow(
      expect.objectContaining({
        details: { issues: [{ path: '', message: "Unrecognized key(s) in object: 'force'" }] },
      }),
    );
  });

  it('validates regular expressions', () => {
    expect(() => parseIntent({ kind: 'replace_text', find: '(', regex: true, replace: '' })).toThrow(
      'Invalid regular expression: (',
    );
    expect(() => parseIntent({ kind: 'replace_text', find: 'a*', regex: true, replace: '' })).toThrow(
      'Selector must not match empty text',
    );
    expect(parseIntent({ kind: 'replace_text', find: 'a*', replace: '' }).kind).toBe('replace_text');
  });

  it('freezes the parsed intent', () => {
    const intent = parseIntent({ kind: 'replace_text', find: 'a', replace: 'b', scope: { tableIndex: 1 } });

    expect(Object.isFrozen(intent)).toBe(true);
    expect(intent.kind === 'replace_text' && Object.isFrozen(intent.scope)).toBe(true);
  });
});

describe('compileSelector', () => {
  it('escapes literal selectors and honours case sensitivity', () => {
    const literal = compileSelector({ kind: 'replace_text', find: 'a.b', replace: '' });
    expect(literal.source).toBe('a\\.b');
    expect(literal.flags).toBe('g');

    const insensitive = compileSelector({ kind: 'replace_text', find: 'x', replace: '', caseSensitive: false });
    expect(insensitive.flags).toBe('gi');
  });
});

describe('describeIntent', () => {
  it('summarizes replace_text selections', () => {
    expect(describeIntent(parseIntent({ kind: 'replace_text', find: '2025', replace: '2026' }))).toBe(
      'Replace "2025" with "2026"',
    );
    expect(
      describeIntent(
        parseIntent({ kind: 'replace_text', find: '2025', replace: '2026', occurrence: 1, scope: { paragraphIndex: 2 } }),
      ),
    ).toBe('Replace match #1 of "2025" with "2026" in paragraph 2');
    expect(
      describeIntent(parseIntent({ kind: 'replace_text', find: '\\d+', regex: true, replace: 'N', matchAll: true })),
    ).toBe('Replace every match of /\\d+/ with "N"');
  });

  it('summarizes structural intents', () => {
    expect(describeIntent(parseIntent({ kind: 'insert_paragraph', afterIndex: -1, text: 'Hi' }))).toBe(
      'Insert "Hi" at the beginning',
    );
    expect(describeIntent(parseIntent({ kind: 'insert_paragraph', afterIndex: 4, text: 'Hi' }))).toBe(
      'Insert "Hi" after paragraph 4',
    );
    expect(describeIntent(parseIntent({ kind: 'delete_paragraph', paragraphIndex: 3 }))).toBe('Delete paragraph 3');
    expect(describeIntent(parseIntent({ kind: 'update_table_cell', tableIndex: 0, row: 1, col: 2, text: 'x' }))).toBe(
      'Set table 0 cell (1, 2) to "x"',
    );
  });

  it('clips long text', () => {
    expect(describeIntent(parseIntent({ kind: 'update_paragraph', paragraphIndex: 0, text: 'a'.repeat(45) }))).toBe(
      `Set paragraph 0 to "${'a'.repeat(40)}…"`,
    );
  });
});
