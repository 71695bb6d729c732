import JSZip from 'jszip';
import { PipelineError, errorMessage } from './errors';
import {
  type XmlPatch,
  type XmlSpan,
  applyPatches,
  checkSectionXml,
  findElementEnd,
  findElements,
  openingTag,
  readAttribute,
  unescapeXml,
} from './xml';

export type NodeLocation =
  | { type: 'paragraph'; paragraphIndex: number; sectionIndex: number }
  | { type: 'cell'; tableIndex: number; row: number; col: number; cellParagraphIndex: number; sectionIndex: number };

/** One `<hp:t>` element and the slice of node text it carries. */
export interface TextSegment extends XmlSpan {
  /** Opening tag normalized to a non-self-closing form, e.g. `<hp:t>`. */
  openTag: string;
  text: string;
  /** False when the element holds markup such as `<hp:tab/>`. */
  plain: boolean;
  from: number;
  to: number;
}

/** Where text goes when a paragraph has no `<hp:t>` yet. */
export interface TextAnchor extends XmlSpan {
  prefix: string;
  suffix: string;
}

export interface TextNode {
  /** Blast-radius unit this text belongs to: a top-level paragraph or a table cell. */
  key: string;
  location: NodeLocation;
  sectionIndex: number;
  span: XmlSpan;
  openTag: string;
  text: string;
  segments: TextSegment[];
  anchor: TextAnchor;
  linesegs: XmlSpan[];
  charPrIDRef: string;
}

export interface ParagraphInfo extends TextNode {
  paragraphIndex: number;
  tableIndexes: number[];
}

export interface CellInfo {
  key: string;
  tableIndex: number;
  row: number;
  col: number;
  sectionIndex: number;
  span: XmlSpan;
  /** Inner span of the element holding the cell paragraphs (`<hp:subList>` or the cell itself). */
  container: XmlSpan;
  paragraphs: TextNode[];
  text: string;
}

export interface TableInfo {
  tableIndex: number;
  sectionIndex: number;
  span: XmlSpan;
  rowCount: number;
  colCount: number;
  cells: CellInfo[][];
}

export interface SectionPatch extends XmlPatch {
  sectionIndex: number;
}

export type DocumentMetadata = Record<string, string>;

interface DocumentIndex {
  paragraphs: ParagraphInfo[];
  tables: TableInfo[];
  /** Offset of each section's closing root tag. */
  sectionEnds: number[];
}

const SECTION_PATH = (index: number) => `Contents/section${index}.xml`;
const CONTENT_HPF = 'Contents/content.hpf';
const REQUIRED_PARTS = ['mimetype', CONTENT_HPF, 'Contents/header.xml', SECTION_PATH(0)];

function segmentText(inner: string): string {
  return unescapeXml(
    inner
      .replace(/<hp:tab\b[^>]*\/>/g, '\t')
      .replace(/<hp:lineBreak\b[^>]*\/>/g, '\n')
      .replace(/<[^>]+>/g, ''),
  );
}

function parseTextNode(
  xml: string,
  span: XmlSpan,
  sectionIndex: number,
  location: NodeLocation,
  key: string,
): { node: TextNode; tables: XmlSpan[] } {
  const openTag = openingTag(xml, span.start);
  if (openTag.endsWith('/>')) {
    const base = openTag.slice(0, -2).trimEnd();
    return {
      node: {
        key,
        location,
        sectionIndex,
        span,
        openTag: `${base}>`,
        text: '',
        segments: [],
        anchor: { start: span.start, end: span.end, prefix: `${base}><hp:run charPrIDRef="0">`, suffix: '</hp:run></hp:p>' },
        linesegs: [],
        charPrIDRef: '0',
      },
      tables: [],
    };
  }

  const innerStart = span.start + openTag.length;
  const innerEnd = span.end - '</hp:p>'.length;
  const tables = findElements(xml, innerStart, innerEnd, 'hp:tbl');
  // header/footer/footnote bodies hang off controls as nested sub-lists
  const foreign = [...tables, ...findElements(xml, innerStart, innerEnd, 'hp:subList', tables)];

  const segments: TextSegment[] = [];
  let cursor = 0;
  for (const t of findElements(xml, innerStart, innerEnd, 'hp:t', foreign)) {
    const tag = openingTag(xml, t.start);
    const selfClosing = tag.endsWith('/>');
    const inner = selfClosing ? '' : xml.slice(t.start + tag.length, t.end - '</hp:t>'.length);
    const text = segmentText(inner);
    segments.push({
      start: t.start,
      end: t.end,
      openTag: selfClosing ? `${tag.slice(0, -2).trimEnd()}>` : tag,
      text,
      plain: !inner.includes('<'),
      from: cursor,
      to: cursor + text.length,
    });
    cursor += text.length;
  }

  const runs = findElements(xml, innerStart, innerEnd, 'hp:run', foreign);
  let anchor: TextAnchor;
  let charPrIDRef = '0';
  if (runs.length > 0) {
    const runTag = openingTag(xml, runs[0].start);
    charPrIDRef = readAttribute(runTag, 'charPrIDRef') ?? '0';
    anchor = runTag.endsWith('/>')
      ? { start: runs[0].start, end: runs[0].end, prefix: `${runTag.slice(0, -2).trimEnd()}>`, suffix: '</hp:run>' }
      : { start: runs[0].start + runTag.length, end: runs[0].start + runTag.length, prefix: '', suffix: '' };
  } else {
    anchor = { start: innerEnd, end: innerEnd, prefix: '<hp:run charPrIDRef="0">', suffix: '</hp:run>' };
  }

  return {
    node: {
      key,
      location,
      sectionIndex,
      span,
      openTag,
      text: segments.map((s) => s.text).join(''),
      segments,
      anchor,
      linesegs: findElements(xml, innerStart, innerEnd, 'hp:linesegarray', foreign),
      charPrIDRef,
    },
    tables,
  };
}

function parseTable(xml: string, span: XmlSpan, sectionIndex: number, tableIndex: number): TableInfo {
  const tblTag = openingTag(xml, span.start);
  const rows = findElements(xml, span.start + tblTag.length, span.end, 'hp:tr');
  const cells = rows.map((tr, row) =>
    findElements(xml, tr.start + openingTag(xml, tr.start).length, tr.end, 'hp:tc').map((tc, col): CellInfo => {
      const tcTag = openingTag(xml, tc.start);
      const tcInner = { start: tc.start + tcTag.length, end: tc.end - '</hp:tc>'.length };
      const subLists = findElements(xml, tcInner.start, tcInner.end, 'hp:subList');
      const container = subLists.length > 0
        ? { start: subLists[0].start + openingTag(xml, subLists[0].start).length, end: subLists[0].end - '</hp:subList>'.length }
        : tcInner;
      const key = `c:${tableIndex}:${row}:${col}`;
      const paragraphs = findElements(xml, container.start, container.end, 'hp:p').map(
        (p, cellParagraphIndex) =>
          parseTextNode(xml, p, sectionIndex, { type: 'cell', tableIndex, row, col, cellParagraphIndex, sectionIndex }, key).node,
      );
      return {
        key,
        tableIndex,
        row,
        col,
        sectionIndex,
        span: tc,
        container,
        paragraphs,
        text: paragraphs.map((p) => p.text).join('\n'),
      };
    }),
  );
  const declaredRows = Number(readAttribute(tblTag, 'rowCnt'));
  const declaredCols = Number(readAttribute(tblTag, 'colCnt'));
  return {
    tableIndex,
    sectionIndex,
    span,
    rowCount: Number.isFinite(declaredRows) && declaredRows > 0 ? declaredRows : cells.length,
    colCount: Number.isFinite(declaredCols) && declaredCols > 0 ? declaredCols : Math.max(0, ...cells.map((r) => r.length)),
    cells,
  };
}

function indexSections(sections: string[]): DocumentIndex {
  const paragraphs: ParagraphInfo[] = [];
  const tables: TableInfo[] = [];
  const sectionEnds: number[] = [];
  const topLevel = /<hp:(p|tbl)(?=[\s>/])/g;

  sections.forEach((xml, sectionIndex) => {
    const rootEnd = xml.lastIndexOf('</');
    sectionEnds.push(rootEnd < 0 ? xml.length : rootEnd);
    topLevel.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = topLevel.exec(xml)) !== null) {
      const name = `hp:${match[1]}`;
      const end = findElementEnd(xml, match.index, name);
      if (end < 0) throw new Error(`Unbalanced <${name}> in section ${sectionIndex} at offset ${match.index}`);
      const span = { start: match.index, end };
      if (name === 'hp:tbl') {
        tables.push(parseTable(xml, span, sectionIndex, tables.length));
      } else {
        const paragraphIndex = paragraphs.length;
        const { node, tables: inner } = parseTextNode(
          xml,
          span,
          sectionIndex,
          { type: 'paragraph', paragraphIndex, sectionIndex },
          `p:${paragraphIndex}`,
        );
        const tableIndexes: number[] = [];
        for (const tableSpan of inner) {
          tableIndexes.push(tables.length);
          tables.push(parseTable(xml, tableSpan, sectionIndex, tables.length));
        }
        paragraphs.push({ ...node, paragraphIndex, tableIndexes });
      }
      topLevel.lastIndex = end;
    }
  });

  return { paragraphs, tables, sectionEnds };
}

function parseMetadata(hpf: string | null): DocumentMetadata {
  const metadata: DocumentMetadata = {};
  if (!hpf) return metadata;
  const title = hpf.match(/<opf:title[^>]*>([^<]*)<\/opf:title>/);
  if (title && title[1].trim()) metadata.title = unescapeXml(title[1].trim());
  for (const meta of hpf.matchAll(/<opf:meta\b[^>]*\bname="([^"]+)"[^>]*>([^<]*)<\/opf:meta>/g)) {
    const value = unescapeXml(meta[2].trim());
    if (value) metadata[meta[1]] = value;
  }
  return metadata;
}

/**
 * An opened HWPX package.
 *
 * Mutations are staged as section patches and only become visible through
 * {@link commitPending}, which the caller invokes once the serialized package
 * has been durably written. Until then readers see the last committed state.
 */
export class HwpxDocument {
  private _zip: JSZip;
  private _sections: string[];
  private _index: DocumentIndex;
  private _metadata: DocumentMetadata;
  private _revision: number;
  private _pending: { sections: string[]; index: DocumentIndex } | null = null;

  private constructor(zip: JSZip, sections: string[], metadata: DocumentMetadata, revision: number) {
    this._zip = zip;
    this._revision = revision;
    this._sections = sections;
    this._metadata = metadata;
    this._index = indexSections(sections);
  }

  /**
   * Parse a package. `revision` seeds the revision counter so a copy loaded
   * again after eviction never reuses a revision an older copy handed out.
   */
  public static async load(data: Buffer | Uint8Array, revision = 1): Promise<HwpxDocument> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (err) {
      throw new PipelineError('DOCUMENT_INVALID', `Not a HWPX package: ${errorMessage(err)}`, { cause: err });
    }

    const sections: string[] = [];
    while (true) {
      const file = zip.file(SECTION_PATH(sections.length));
      if (!file) break;
      sections.push(await file.async('string'));
    }
    if (sections.length === 0) {
      throw new PipelineError('DOCUMENT_INVALID', `HWPX package has no ${SECTION_PATH(0)}`);
    }

    const hpf = zip.file(CONTENT_HPF);
    const metadata = parseMetadata(hpf ? await hpf.async('string') : null);
    try {
      return new HwpxDocument(zip, sections, metadata, revision);
    } catch (err) {
      throw new PipelineError('DOCUMENT_INVALID', `Malformed section XML: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Check a serialized package before it replaces the stored copy: the
   * required parts exist and no section part is truncated or broken.
   */
  public static async verifyPackage(data: Buffer | Uint8Array): Promise<void> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (err) {
      throw new PipelineError('DOCUMENT_INVALID', `Saved package is not a valid archive: ${errorMessage(err)}`);
    }
    const missing = REQUIRED_PARTS.filter((part) => !zip.file(part));
    if (missing.length > 0) {
      throw new PipelineError('DOCUMENT_INVALID', `Missing required files: ${missing.join(', ')}`);
    }
    const sectionFiles = Object.keys(zip.files).filter((name) => /^Contents\/section\d+\.xml$/.test(name));
    for (const name of sectionFiles) {
      const file = zip.file(name);
      if (!file) continue;
      const problem = checkSectionXml(await file.async('string'));
      if (problem) {
        throw new PipelineError('DOCUMENT_INVALID', `Invalid XML in ${name}: ${problem}`);
      }
    }
  }

  /** Increments on every committed mutation. Previews record it to detect staleness. */
  get revision(): number {
    return this._revision;
  }

  get sectionCount(): number {
    return this._sections.length;
  }

  get paragraphs(): readonly ParagraphInfo[] {
    return this._index.paragraphs;
  }

  get tables(): readonly TableInfo[] {
    return this._index.tables;
  }

  /** Blast-radius denominator: top-level paragraphs plus table cells. */
  get nodeCount(): number {
    let cells = 0;
    for (const table of this._index.tables) {
      for (const row of table.cells) cells += row.length;
    }
    return this._index.paragraphs.length + cells;
  }

  get hasPendingChanges(): boolean {
    return this._pending !== null;
  }

  getMetadata(): DocumentMetadata {
    return { ...this._metadata };
  }

  getSectionXml(sectionIndex: number): string {
    const xml = this._sections[sectionIndex];
    if (xml === undefined) throw new RangeError(`Section ${sectionIndex} not found`);
    return xml;
  }

  sectionEnd(sectionIndex: number): number {
    return this._index.sectionEnds[sectionIndex] ?? 0;
  }

  getAllText(): string {
    return this._index.paragraphs.map((p) => p.text).join('\n');
  }

  /** Every text-bearing paragraph, top-level ones first, then cell paragraphs in table order. */
  textNodes(): TextNode[] {
    const nodes: TextNode[] = [...this._index.paragraphs];
    for (const table of this._index.tables) {
      for (const row of table.cells) {
        for (const cell of row) nodes.push(...cell.paragraphs);
      }
    }
    return nodes;
  }

  /**
   * Stage patches against the committed sections. The patched sections are
   * re-indexed immediately so a structurally broken result is rejected here
   * rather than at save time.
   */
  stage(patches: SectionPatch[]): void {
    const sections = [...this._sections];
    const bySection = new Map<number, SectionPatch[]>();
    for (const patch of patches) {
      if (patch.sectionIndex < 0 || patch.sectionIndex >= sections.length) {
        throw new RangeError(`Section ${patch.sectionIndex} not found`);
      }
      const list = bySection.get(patch.sectionIndex) ?? [];
      list.push(patch);
      bySection.set(patch.sectionIndex, list);
    }
    for (const [sectionIndex, list] of bySection) {
      const next = applyPatches(sections[sectionIndex], list);
      const problem = checkSectionXml(next);
      if (problem) throw new Error(`Section ${sectionIndex} would be corrupted: ${problem}`);
      sections[sectionIndex] = next;
    }
    this._pending = { sections, index: indexSections(sections) };
  }

  discardPending(): void {
    this._pending = null;
  }

  /** Serialize the package with pending changes, if any, without committing them. */
  async serialize(): Promise<Buffer> {
    const sections = this._pending ? this._pending.sections : this._sections;
    sections.forEach((xml, i) => this._zip.file(SECTION_PATH(i), xml));

    // HWPX follows the ODF container rules: mimetype must be stored uncompressed
    const mimetype = this._zip.file('mimetype');
    if (mimetype) {
      this._zip.file('mimetype', await mimetype.async('string'), { compression: 'STORE' });
    }

    return await this._zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  }

  commitPending(): void {
    if (!this._pending) return;
    this._sections = this._pending.sections;
    this._index = this._pending.index;
    this._pending = null;
    this._revision++;
  }
}
