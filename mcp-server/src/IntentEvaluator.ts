import { diffWordsWithSpace } from 'diff';
import { type EditIntent, type ReplaceTextIntent, compileSelector } from './EditIntent';
import { PipelineError } from './errors';
import type { HwpxDocument, NodeLocation, ParagraphInfo, SectionPatch, TextNode } from './HwpxDocument';
import { escapeXml, readAttribute, setAttribute } from './xml';

export interface WordChange {
  type: 'equal' | 'insert' | 'delete';
  text: string;
}

export interface ChangeFragment {
  op: 'replace' | 'insert' | 'delete';
  location: NodeLocation;
  before: string;
  after: string;
  changes: WordChange[];
}

export interface AmbiguityCandidate {
  candidateIndex: number;
  location: NodeLocation;
  /** Offsets of the match within the text of `location`. */
  start: number;
  end: number;
  match: string;
  context: string;
}

export interface Evaluation {
  fragments: ChangeFragment[];
  candidates: AmbiguityCandidate[];
  ambiguous: boolean;
  disambiguated: boolean;
  affectedNodes: number;
  totalNodes: number;
  /** affectedNodes / max(totalNodes, 4), so tiny documents do not score every edit as a wildcard. */
  safetyScore: number;
  patches: SectionPatch[];
}

interface TextEdit {
  from: number;
  to: number;
  text: string;
}

const CONTEXT_CHARS = 20;
const MIN_SCORE_DENOMINATOR = 4;

function targetNotFound(message: string, details: Record<string, unknown>): PipelineError {
  return new PipelineError('TARGET_NOT_FOUND', message, { details });
}

function encodeText(text: string): string {
  return escapeXml(text).replace(/\t/g, '<hp:tab/>').replace(/\n/g, '<hp:lineBreak/>');
}

function newParagraphId(): string {
  return String(Math.floor(Math.random() * 2_000_000_000) + 1);
}

export function wordChanges(before: string, after: string): WordChange[] {
  return diffWordsWithSpace(before, after).map((part) => ({
    type: part.added ? 'insert' : part.removed ? 'delete' : 'equal',
    text: part.value,
  }));
}

function fragment(op: ChangeFragment['op'], location: NodeLocation, before: string, after: string): ChangeFragment {
  return { op, location, before, after, changes: wordChanges(before, after) };
}

/** Expand `$&`, `$1`, `$<name>`, `` $` ``, `$'` and `$$` the way String.prototype.replace does. */
export function expandReplacement(template: string, match: RegExpMatchArray, subject: string): string {
  const index = match.index ?? 0;
  return template.replace(/\$(\$|&|`|'|<([^>]*)>|\d{1,2})/g, (token: string, symbol: string, name?: string) => {
    if (symbol === '$') return '$';
    if (symbol === '&') return match[0];
    if (symbol === '`') return subject.slice(0, index);
    if (symbol === "'") return subject.slice(index + match[0].length);
    if (name !== undefined) {
      return match.groups ? match.groups[name] ?? '' : token;
    }
    const group = Number(symbol);
    if (group >= 1 && group < match.length) return match[group] ?? '';
    if (symbol.length === 2) {
      const single = Number(symbol[0]);
      if (single >= 1 && single < match.length) return (match[single] ?? '') + symbol[1];
    }
    return token;
  });
}

/** Apply text edits to a node, returning the section patches and the new node text. */
export function spliceNodeText(node: TextNode, edits: TextEdit[]): { patches: SectionPatch[]; text: string } {
  const sorted = [...edits].sort((a, b) => a.from - b.from);
  let text = '';
  let cursor = 0;
  for (const edit of sorted) {
    text += node.text.slice(cursor, edit.from) + edit.text;
    cursor = edit.to;
  }
  text += node.text.slice(cursor);
  if (text === node.text) return { patches: [], text };

  const patches: SectionPatch[] = [];
  const sectionIndex = node.sectionIndex;

  if (node.segments.length === 0) {
    const { anchor } = node;
    patches.push({
      sectionIndex,
      start: anchor.start,
      end: anchor.end,
      text: `${anchor.prefix}<hp:t>${encodeText(text)}</hp:t>${anchor.suffix}`,
    });
  } else {
    const total = node.text.length;
    const last = node.segments.length - 1;
    const owner = (offset: number) => {
      const index = node.segments.findIndex((s) => s.from <= offset && offset < s.to);
      return index < 0 || offset >= total ? last : index;
    };
    const owners = sorted.map((edit) => owner(edit.from));

    node.segments.forEach((segment, i) => {
      let out = '';
      let pos = segment.from;
      sorted.forEach((edit, e) => {
        const start = Math.max(edit.from, segment.from);
        const end = Math.min(edit.to, segment.to);
        const owned = owners[e] === i;
        if (start >= end && !owned) return;
        out += segment.text.slice(pos - segment.from, start - segment.from);
        if (owned) out += edit.text;
        pos = Math.max(pos, end);
      });
      out += segment.text.slice(pos - segment.from);
      if (out !== segment.text) {
        patches.push({
          sectionIndex,
          start: segment.start,
          end: segment.end,
          text: `${segment.openTag}${encodeText(out)}</hp:t>`,
        });
      }
    });
  }

  // cached line layout is stale once the text changes; the word processor rebuilds it
  for (const lineseg of node.linesegs) {
    patches.push({ sectionIndex, start: lineseg.start, end: lineseg.end, text: '' });
  }
  return { patches, text };
}

function setNodeText(node: TextNode, text: string): { patches: SectionPatch[]; text: string } {
  return spliceNodeText(node, [{ from: 0, to: node.text.length, text }]);
}

function score(affected: number, total: number): number {
  return Math.min(1, affected / Math.max(total, MIN_SCORE_DENOMINATOR));
}

function paragraphAt(doc: HwpxDocument, paragraphIndex: number): ParagraphInfo {
  const paragraph = doc.paragraphs[paragraphIndex];
  if (!paragraph) {
    throw targetNotFound(`Paragraph ${paragraphIndex} not found`, {
      paragraphIndex,
      paragraphCount: doc.paragraphs.length,
    });
  }
  return paragraph;
}

function scopedNodes(doc: HwpxDocument, intent: ReplaceTextIntent): TextNode[] {
  const scope = intent.scope;
  if (scope?.paragraphIndex !== undefined) return [paragraphAt(doc, scope.paragraphIndex)];
  if (scope?.tableIndex !== undefined) {
    const table = doc.tables[scope.tableIndex];
    if (!table) {
      throw targetNotFound(`Table ${scope.tableIndex} not found`, {
        tableIndex: scope.tableIndex,
        tableCount: doc.tables.length,
      });
    }
    return table.cells.flatMap((row) => row.flatMap((cell) => cell.paragraphs));
  }
  return doc.textNodes();
}

function evaluateReplaceText(doc: HwpxDocument, intent: ReplaceTextIntent): Evaluation {
  const selector = compileSelector(intent);
  const nodes = scopedNodes(doc, intent);

  const matches: Array<{ node: TextNode; match: RegExpMatchArray; candidate: AmbiguityCandidate }> = [];
  for (const node of nodes) {
    for (const match of node.text.matchAll(selector)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      matches.push({
        node,
        match,
        candidate: {
          candidateIndex: matches.length,
          location: node.location,
          start,
          end,
          match: match[0],
          context: node.text.slice(Math.max(0, start - CONTEXT_CHARS), end + CONTEXT_CHARS),
        },
      });
    }
  }
  if (matches.length === 0) {
    throw targetNotFound(`No text matches ${intent.regex ? `/${intent.find}/` : JSON.stringify(intent.find)}`, {
      find: intent.find,
      scope: intent.scope ?? null,
    });
  }

  const disambiguated = intent.occurrence !== undefined || intent.matchAll === true;
  let selected = matches;
  if (intent.occurrence !== undefined) {
    const chosen = matches[intent.occurrence];
    if (!chosen) {
      throw targetNotFound(`Occurrence ${intent.occurrence} not found`, {
        occurrence: intent.occurrence,
        candidateCount: matches.length,
      });
    }
    selected = [chosen];
  }

  // keyed by the node object: cell paragraphs share their cell's key
  const editsByNode = new Map<TextNode, TextEdit[]>();
  for (const { node, match, candidate } of selected) {
    const edits = editsByNode.get(node) ?? [];
    edits.push({
      from: candidate.start,
      to: candidate.end,
      text: intent.regex ? expandReplacement(intent.replace, match, node.text) : intent.replace,
    });
    editsByNode.set(node, edits);
  }

  const fragments: ChangeFragment[] = [];
  const patches: SectionPatch[] = [];
  const affected = new Set<string>();
  for (const [node, edits] of editsByNode) {
    const result = spliceNodeText(node, edits);
    patches.push(...result.patches);
    fragments.push(fragment('replace', node.location, node.text, result.text));
    affected.add(node.key);
  }

  const totalNodes = doc.nodeCount;
  return {
    fragments,
    candidates: matches.map((m) => m.candidate),
    ambiguous: matches.length > 1 && !disambiguated,
    disambiguated,
    affectedNodes: affected.size,
    totalNodes,
    safetyScore: score(affected.size, totalNodes),
    patches,
  };
}

function single(doc: HwpxDocument, fragments: ChangeFragment[], patches: SectionPatch[], affectedNodes = 1): Evaluation {
  const totalNodes = doc.nodeCount;
  return {
    fragments,
    candidates: [],
    ambiguous: false,
    disambiguated: false,
    affectedNodes,
    totalNodes,
    safetyScore: score(affectedNodes, totalNodes),
    patches,
  };
}

function paragraphXml(template: TextNode | undefined, text: string): string {
  const paraPr = (template && readAttribute(template.openTag, 'paraPrIDRef')) ?? '0';
  const style = (template && readAttribute(template.openTag, 'styleIDRef')) ?? '0';
  const charPr = template?.charPrIDRef ?? '0';
  return (
    `<hp:p id="${newParagraphId()}" paraPrIDRef="${paraPr}" styleIDRef="${style}" pageBreak="0" columnBreak="0" merged="0">` +
    `<hp:run charPrIDRef="${charPr}"><hp:t>${encodeText(text)}</hp:t></hp:run></hp:p>`
  );
}

/**
 * Work out what an intent would do to a document without touching it: the
 * change fragments a client reviews, every candidate a text selector matches,
 * the blast radius, and the section patches that carry the change out.
 */
export function evaluateIntent(doc: HwpxDocument, intent: EditIntent): Evaluation {
  switch (intent.kind) {
    case 'replace_text':
      return evaluateReplaceText(doc, intent);

    case 'update_paragraph': {
      const paragraph = paragraphAt(doc, intent.paragraphIndex);
      const result = setNodeText(paragraph, intent.text);
      return single(doc, [fragment('replace', paragraph.location, paragraph.text, result.text)], result.patches);
    }

    case 'insert_paragraph': {
      let reference: ParagraphInfo | undefined;
      let sectionIndex = 0;
      let offset: number;
      if (intent.afterIndex < 0) {
        reference = doc.paragraphs[0];
        offset = reference ? reference.span.start : doc.sectionEnd(0);
      } else {
        reference = paragraphAt(doc, intent.afterIndex);
        offset = reference.span.end;
      }
      if (reference) sectionIndex = reference.sectionIndex;
      const location: NodeLocation = { type: 'paragraph', paragraphIndex: intent.afterIndex + 1, sectionIndex };
      return single(
        doc,
        [fragment('insert', location, '', intent.text)],
        [{ sectionIndex, start: offset, end: offset, text: paragraphXml(reference, intent.text) }],
      );
    }

    case 'delete_paragraph': {
      const paragraph = paragraphAt(doc, intent.paragraphIndex);
      const siblings = doc.paragraphs.filter((p) => p.sectionIndex === paragraph.sectionIndex);
      if (siblings.length <= 1) {
        throw new PipelineError('UNSUPPORTED_INTENT', 'Cannot delete the last paragraph of a section', {
          details: { paragraphIndex: intent.paragraphIndex, sectionIndex: paragraph.sectionIndex },
          hint: 'Use update_paragraph to clear its text instead.',
        });
      }
      let cells = 0;
      for (const tableIndex of paragraph.tableIndexes) {
        for (const row of doc.tables[tableIndex]?.cells ?? []) cells += row.length;
      }
      return single(
        doc,
        [fragment('delete', paragraph.location, paragraph.text, '')],
        [{ sectionIndex: paragraph.sectionIndex, start: paragraph.span.start, end: paragraph.span.end, text: '' }],
        1 + cells,
      );
    }

    case 'update_table_cell': {
      const table = doc.tables[intent.tableIndex];
      const cell = table?.cells[intent.row]?.[intent.col];
      if (!table || !cell) {
        throw targetNotFound(`Cell (${intent.row}, ${intent.col}) of table ${intent.tableIndex} not found`, {
          tableIndex: intent.tableIndex,
          row: intent.row,
          col: intent.col,
          tableCount: doc.tables.length,
          rowCount: table?.rowCount ?? null,
          colCount: table?.colCount ?? null,
        });
      }
      const location: NodeLocation = {
        type: 'cell',
        tableIndex: cell.tableIndex,
        row: cell.row,
        col: cell.col,
        cellParagraphIndex: 0,
        sectionIndex: cell.sectionIndex,
      };
      const [first, ...rest] = cell.paragraphs;
      const sectionIndex = cell.sectionIndex;
      if (!first) {
        return single(
          doc,
          [fragment('replace', location, cell.text, intent.text)],
          [{ sectionIndex, start: cell.container.start, end: cell.container.end, text: paragraphXml(undefined, intent.text) }],
        );
      }

      // one paragraph per line, cloned from the first so cell formatting carries over
      const [head, ...tail] = intent.text.split('\n');
      const { patches } = setNodeText(first, head);
      for (const paragraph of rest) {
        patches.push({ sectionIndex, start: paragraph.span.start, end: paragraph.span.end, text: '' });
      }
      if (tail.length > 0) {
        const extra = tail
          .map((line) =>
            `${setAttribute(first.openTag, 'id', newParagraphId())}` +
            `<hp:run charPrIDRef="${first.charPrIDRef}"><hp:t>${encodeText(line)}</hp:t></hp:run></hp:p>`,
          )
          .join('');
        patches.push({ sectionIndex, start: first.span.end, end: first.span.end, text: extra });
      }
      return single(doc, [fragment('replace', location, cell.text, intent.text)], patches);
    }
  }
}
