/**
 * String-level XML helpers for HWPX section parts.
 *
 * Section XML is edited in place rather than re-serialized so that every
 * attribute and element this server does not understand survives a save.
 */

export interface XmlSpan {
  start: number;
  end: number;
}

/** Replacement of `xml.slice(start, end)` by `text`. */
export interface XmlPatch extends XmlSpan {
  text: string;
}

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&#x([0-9a-fA-F]+);/g, (_, code: string) => String.fromCodePoint(parseInt(code, 16)))
    .replace(/&amp;/g, '&');
}

function tagPattern(name: string): RegExp {
  return new RegExp(`<(/?)${escapeRegex(name)}(?=[\\s>/])[^>]*>`, 'g');
}

/**
 * Position right after the element that opens at `start`, using balanced
 * matching so nested elements of the same name are skipped. -1 when the
 * element is never closed.
 */
export function findElementEnd(xml: string, start: number, name: string): number {
  const pattern = tagPattern(name);
  pattern.lastIndex = start;
  let depth = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(xml)) !== null) {
    const tag = match[0];
    if (match[1]) {
      depth--;
      if (depth === 0) return match.index + tag.length;
      if (depth < 0) return -1;
    } else if (tag.endsWith('/>')) {
      if (depth === 0) return match.index + tag.length;
    } else {
      depth++;
    }
  }
  return -1;
}

/**
 * Elements named `name` found between `from` and `to`, without descending into
 * a match or into any of the `skip` spans.
 */
export function findElements(xml: string, from: number, to: number, name: string, skip: XmlSpan[] = []): XmlSpan[] {
  const open = new RegExp(`<${escapeRegex(name)}(?=[\\s>/])`, 'g');
  open.lastIndex = from;
  const spans: XmlSpan[] = [];
  let match: RegExpExecArray | null;
  while ((match = open.exec(xml)) !== null && match.index < to) {
    const inside = skip.find((span) => match !== null && match.index >= span.start && match.index < span.end);
    if (inside) {
      open.lastIndex = inside.end;
      continue;
    }
    const end = findElementEnd(xml, match.index, name);
    if (end < 0 || end > to) {
      throw new Error(`Unbalanced <${name}> at offset ${match.index}`);
    }
    spans.push({ start: match.index, end });
    open.lastIndex = end;
  }
  return spans;
}

/** The opening tag of the element starting at `start`. */
export function openingTag(xml: string, start: number): string {
  const close = xml.indexOf('>', start);
  return close < 0 ? '' : xml.slice(start, close + 1);
}

export function readAttribute(tag: string, attr: string): string | undefined {
  const match = tag.match(new RegExp(`\\s${escapeRegex(attr)}="([^"]*)"`));
  return match ? match[1] : undefined;
}

export function setAttribute(tag: string, attr: string, value: string): string {
  const pattern = new RegExp(`(\\s${escapeRegex(attr)}=")[^"]*(")`);
  if (pattern.test(tag)) return tag.replace(pattern, `$1${value}$2`);
  return tag.replace(/(\s*\/?>)$/, ` ${attr}="${value}"$1`);
}

/** Apply non-overlapping patches; later offsets are applied first so earlier ones stay valid. */
export function applyPatches(xml: string, patches: XmlPatch[], base = 0): string {
  const ordered = [...patches].sort((a, b) => b.start - a.start || b.end - a.end);
  let result = xml;
  let limit = Number.POSITIVE_INFINITY;
  for (const patch of ordered) {
    if (patch.end > limit) {
      throw new Error(`Overlapping XML patches at offset ${patch.start}`);
    }
    result = result.slice(0, patch.start - base) + patch.text + result.slice(patch.end - base);
    limit = patch.start;
  }
  return result;
}

/**
 * Cheap structural checks run on a section part before it is written,
 * mirroring the save-time verification of the document package.
 */
export function checkSectionXml(xml: string): string | null {
  if (!xml.includes('<?xml')) return 'missing XML declaration';
  if (/<[^>]*$/.test(xml)) return 'truncated XML';
  if (/<[^>]*</.test(xml)) return 'broken tag structure';
  return null;
}
