import { ErrorCode, type GetPromptResult, type ListPromptsResult, McpError, type Prompt } from '@modelcontextprotocol/sdk/types.js';

interface PromptArgumentDefinition {
  name: string;
  description: string;
  required: boolean;
  /** Used when an optional argument is left out. */
  default?: string;
  pattern?: RegExp;
}

interface PromptTemplate {
  id: string;
  version: string;
  title: string;
  description: string;
  /** `{name}` is replaced by the argument of that name. */
  template: string;
  arguments: PromptArgumentDefinition[];
}

const PATH_ARGUMENT: PromptArgumentDefinition = {
  name: 'path',
  description: 'Path of the HWPX document, relative to the workspace root',
  required: true,
};

const INDEX = /^[0-9]+$/;

const TEMPLATES: PromptTemplate[] = [
  {
    id: 'staged_edit',
    version: 'v1',
    title: 'Staged document edit',
    description: 'Walk an edit through open, plan, preview and apply, with the user approving the diff.',
    template:
      'Make this change to the HWPX document {path}: {change}\n' +
      'Follow the staged edit workflow:\n' +
      '1) Call `open_document_handle` with {"locator": "{path}"} and keep the handleId.\n' +
      '2) Read hwpx://documents/<handleId>/paragraphs if you need paragraph or table indexes.\n' +
      '3) Call `plan_edit` with {"target": {"handleId": "<handleId>"}, "intent": <intent>} using the intent kind that expresses the change.\n' +
      '4) Call `preview_edit` with the planId. Show the diff and the safety score to the user.\n' +
      '5) If the preview is ambiguous, plan again with occurrence, matchAll or a narrower scope. Do not apply it.\n' +
      '6) Once the user approves, call `apply_edit` with {"planId": "<planId>", "confirm": true, "idempotencyKey": "{idempotencyKey}"}.\n' +
      '7) If apply_edit reports PREVIEW_REQUIRED, preview again and ask for approval again.\n',
    arguments: [
      PATH_ARGUMENT,
      { name: 'change', description: 'The edit to make, in plain words', required: true },
      {
        name: 'idempotencyKey',
        description: 'Key that makes a retried apply_edit return the first result',
        required: false,
        default: 'edit-1',
      },
    ],
  },
  {
    id: 'replace_text',
    version: 'v1',
    title: 'Find and replace',
    description: 'Replace text after reviewing every place it matches.',
    template:
      'Replace "{find}" with "{replace}" in the HWPX document {path}.\n' +
      '1) Call `plan_edit` with {"target": "{path}", "intent": {"kind": "replace_text", "find": "{find}", "replace": "{replace}"}}.\n' +
      '2) Call `preview_edit` with the planId and list every ambiguity candidate with its text.\n' +
      '3) Apply to {scope}: plan again with "occurrence" set to a candidate index, or with "matchAll": true for every match.\n' +
      '4) Preview the new plan, show the diff, and call `apply_edit` with "confirm": true once the user agrees.\n',
    arguments: [
      PATH_ARGUMENT,
      { name: 'find', description: 'Text to look for', required: true },
      { name: 'replace', description: 'Replacement text', required: true },
      {
        name: 'scope',
        description: 'Which matches to change (for example "the first match only" or "every match")',
        required: false,
        default: 'the matches the user picks',
      },
    ],
  },
  {
    id: 'table_cell_update',
    version: 'v1',
    title: 'Update a table cell',
    description: 'Set the text of one table cell through a reviewed plan.',
    template:
      'Set cell ({row}, {col}) of table {tableIndex} in the HWPX document {path} to "{text}".\n' +
      '1) Call `open_document_handle` with {"locator": "{path}"} and read hwpx://documents/<handleId>/tables to check the cell exists.\n' +
      '2) Call `plan_edit` with {"target": {"handleId": "<handleId>"}, "intent": {"kind": "update_table_cell", "tableIndex": {tableIndex}, "row": {row}, "col": {col}, "text": "{text}"}}.\n' +
      '3) Call `preview_edit`, show the before and after text of the cell, then call `apply_edit` with "confirm": true.\n',
    arguments: [
      PATH_ARGUMENT,
      { name: 'tableIndex', description: '0-based table index across the document', required: true, pattern: INDEX },
      { name: 'row', description: '0-based row index', required: true, pattern: INDEX },
      { name: 'col', description: '0-based column index', required: true, pattern: INDEX },
      { name: 'text', description: 'New cell text', required: true },
    ],
  },
];

function promptName(template: PromptTemplate): string {
  return `${template.id}@${template.version}`;
}

function toPrompt(template: PromptTemplate): Prompt {
  return {
    name: promptName(template),
    title: template.title,
    description: template.description,
    arguments: template.arguments.map(({ name, description, required }) => ({ name, description, required })),
  };
}

function normalizeArguments(template: PromptTemplate, values: Record<string, string> | undefined): Map<string, string> {
  const normalized = new Map<string, string>();
  for (const arg of template.arguments) {
    const raw = values?.[arg.name];
    if (raw === undefined || raw === '') {
      if (arg.required) {
        throw new McpError(ErrorCode.InvalidParams, `Prompt argument "${arg.name}" is required`);
      }
      normalized.set(arg.name, arg.default ?? '');
      continue;
    }
    if (arg.pattern && !arg.pattern.test(raw)) {
      throw new McpError(ErrorCode.InvalidParams, `Prompt argument "${arg.name}" must match ${arg.pattern.source}`);
    }
    normalized.set(arg.name, raw);
  }
  return normalized;
}

export function listPrompts(): ListPromptsResult {
  return { prompts: TEMPLATES.map(toPrompt) };
}

export function getPrompt(name: string, values?: Record<string, string>): GetPromptResult {
  const template = TEMPLATES.find((t) => promptName(t) === name);
  if (!template) {
    throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`);
  }
  const normalized = normalizeArguments(template, values);
  const text = template.template.replace(/\{(\w+)\}/g, (placeholder, key: string) => normalized.get(key) ?? placeholder);
  return {
    description: template.description,
    messages: [{ role: 'user', content: { type: 'text', text } }],
  };
}
