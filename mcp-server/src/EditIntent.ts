import { z } from 'zod';
import { PipelineError } from './errors';
import { escapeRegex } from './xml';

const index = z.number().int().min(0);

const replaceTextSchema = z
  .object({
    kind: z.literal('replace_text'),
    find: z.string().min(1, 'find must not be empty'),
    replace: z.string(),
    regex: z.boolean().optional(),
    caseSensitive: z.boolean().optional(),
    scope: z
      .object({ paragraphIndex: index.optional(), tableIndex: index.optional() })
      .strict()
      .refine((scope) => scope.paragraphIndex === undefined || scope.tableIndex === undefined, {
        message: 'scope takes either paragraphIndex or tableIndex, not both',
      })
      .optional(),
    /** Pick one candidate (0-based, in document order). */
    occurrence: index.optional(),
    /** Explicitly target every candidate. */
    matchAll: z.boolean().optional(),
  })
  .strict()
  .refine((intent) => intent.occurrence === undefined || intent.matchAll !== true, {
    message: 'occurrence and matchAll are mutually exclusive',
  });

const updateParagraphSchema = z
  .object({ kind: z.literal('update_paragraph'), paragraphIndex: index, text: z.string() })
  .strict();

const insertParagraphSchema = z
  .object({ kind: z.literal('insert_paragraph'), afterIndex: z.number().int().min(-1), text: z.string() })
  .strict();

const deleteParagraphSchema = z
  .object({ kind: z.literal('delete_paragraph'), paragraphIndex: index })
  .strict();

const updateTableCellSchema = z
  .object({ kind: z.literal('update_table_cell'), tableIndex: index, row: index, col: index, text: z.string() })
  .strict();

export const editIntentSchema = z.union([
  replaceTextSchema,
  updateParagraphSchema,
  insertParagraphSchema,
  deleteParagraphSchema,
  updateTableCellSchema,
]);

export type EditIntent = z.infer<typeof editIntentSchema>;
export type ReplaceTextIntent = z.infer<typeof replaceTextSchema>;
export type IntentKind = EditIntent['kind'];

export const INTENT_KINDS: readonly IntentKind[] = [
  'replace_text',
  'update_paragraph',
  'insert_paragraph',
  'delete_paragraph',
  'update_table_cell',
];

function isIntentKind(value: unknown): value is IntentKind {
  return typeof value === 'string' && (INTENT_KINDS as readonly string[]).includes(value);
}

/** Compile the selector of a replace_text intent. Always global. */
export function compileSelector(intent: ReplaceTextIntent): RegExp {
  const flags = intent.caseSensitive === false ? 'gi' : 'g';
  const source = intent.regex ? intent.find : escapeRegex(intent.find);
  return new RegExp(source, flags);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a client-supplied intent. The result is frozen: a plan's intent
 * never changes after creation.
 */
export function parseIntent(raw: unknown): EditIntent {
  const kind = raw && typeof raw === 'object' && 'kind' in raw ? raw.kind : undefined;
  if (!isIntentKind(kind)) {
    throw new PipelineError('UNSUPPORTED_INTENT', `Unsupported intent kind: ${JSON.stringify(kind ?? null)}`, {
      details: { supportedKinds: INTENT_KINDS },
    });
  }

  const parsed = editIntentSchema.safeParse(raw);
  if (!parsed.success) {
    // the union reports one branch per kind; keep the issues of the branch that was asked for
    const issues = parsed.error.issues.flatMap((issue) => {
      if (issue.code !== 'invalid_union') return [issue];
      const branch = issue.unionErrors.find((e) => !e.issues.some((i) => i.path[0] === 'kind'));
      return branch ? branch.issues : [issue];
    });
    throw new PipelineError('UNSUPPORTED_INTENT', `Invalid ${kind} intent`, {
      details: {
        issues: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    });
  }

  const intent = parsed.data;
  if (intent.kind === 'replace_text') {
    let selector: RegExp;
    try {
      selector = compileSelector(intent);
    } catch (err) {
      throw new PipelineError('UNSUPPORTED_INTENT', `Invalid regular expression: ${intent.find}`, { cause: err });
    }
    if (selector.test('')) {
      throw new PipelineError('UNSUPPORTED_INTENT', 'Selector must not match empty text', {
        hint: 'Use a pattern that consumes at least one character.',
      });
    }
  }
  return deepFreeze(intent);
}

function quote(text: string, max = 40): string {
  const clipped = text.length > max ? `${text.slice(0, max)}…` : text;
  return JSON.stringify(clipped);
}

export function describeIntent(intent: EditIntent): string {
  switch (intent.kind) {
    case 'replace_text': {
      let where = '';
      if (intent.scope?.paragraphIndex !== undefined) where = ` in paragraph ${intent.scope.paragraphIndex}`;
      if (intent.scope?.tableIndex !== undefined) where = ` in table ${intent.scope.tableIndex}`;
      const which = intent.matchAll ? 'every match of' : intent.occurrence !== undefined ? `match #${intent.occurrence} of` : '';
      const selector = intent.regex ? `/${intent.find}/` : quote(intent.find);
      return `Replace ${which ? `${which} ` : ''}${selector} with ${quote(intent.replace)}${where}`;
    }
    case 'update_paragraph':
      return `Set paragraph ${intent.paragraphIndex} to ${quote(intent.text)}`;
    case 'insert_paragraph':
      return intent.afterIndex < 0
        ? `Insert ${quote(intent.text)} at the beginning`
        : `Insert ${quote(intent.text)} after paragraph ${intent.afterIndex}`;
    case 'delete_paragraph':
      return `Delete paragraph ${intent.paragraphIndex}`;
    case 'update_table_cell':
      return `Set table ${intent.tableIndex} cell (${intent.row}, ${intent.col}) to ${quote(intent.text)}`;
  }
}
