// In-memory HWPX packages for the test suites.
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import type { ServerConfig } from './config';
import { escapeXml } from './xml';

/** A paragraph's text, a table given as rows of cell text, or raw section XML. */
export type FixtureBlock = string | { table: string[][] } | { raw: string };

export interface FixtureOptions {
  title?: string;
  meta?: Record<string, string>;
}

const LINESEG =
  '<hp:linesegarray><hp:lineseg textpos="0" vertpos="0" vertsize="1000" textheight="1000" baseline="850" spacing="600" horzpos="0" horzsize="42520" flags="393216"/></hp:linesegarray>';

let nextId = 1;

export function paragraphXml(text: string, withLineseg = true): string {
  return (
    `<hp:p id="${nextId++}" paraPrIDRef="3" styleIDRef="0" pageBreak="0" columnBreak="0" merged="0">` +
    `<hp:run charPrIDRef="7"><hp:t>${escapeXml(text)}</hp:t></hp:run>${withLineseg ? LINESEG : ''}</hp:p>`
  );
}

export function tableXml(rows: string[][]): string {
  const colCnt = Math.max(...rows.map((r) => r.length));
  const body = rows
    .map(
      (row) =>
        `<hp:tr>${row
          .map((cell) => `<hp:tc><hp:subList>${paragraphXml(cell)}</hp:subList></hp:tc>`)
          .join('')}</hp:tr>`,
    )
    .join('');
  return (
    `<hp:p id="${nextId++}" paraPrIDRef="0" styleIDRef="0" pageBreak="0" columnBreak="0" merged="0">` +
    `<hp:run charPrIDRef="0"><hp:tbl id="${nextId++}" rowCnt="${rows.length}" colCnt="${colCnt}">${body}</hp:tbl></hp:run></hp:p>`
  );
}

export function sectionXml(blocks: FixtureBlock[]): string {
  const body = blocks
    .map((block) => (typeof block === 'string' ? paragraphXml(block) : 'table' in block ? tableXml(block.table) : block.raw))
    .join('');
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes" ?>' +
    '<hs:sec xmlns:hp="http://www.hancom.co.kr/hwpml/2011/paragraph" xmlns:hs="http://www.hancom.co.kr/hwpml/2011/section">' +
    `${body}</hs:sec>`
  );
}

export async function buildHwpx(sections: FixtureBlock[][], options: FixtureOptions = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/hwp+zip', { compression: 'STORE' });
  const metas = Object.entries(options.meta ?? {})
    .map(([name, value]) => `<opf:meta name="${name}" content="text">${escapeXml(value)}</opf:meta>`)
    .join('');
  zip.file(
    'Contents/content.hpf',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes" ?>' +
      '<opf:package xmlns:opf="http://www.idpf.org/2007/opf/"><opf:metadata>' +
      `<opf:title>${escapeXml(options.title ?? '')}</opf:title>${metas}</opf:metadata></opf:package>`,
  );
  zip.file(
    'Contents/header.xml',
    '<?xml version="1.0" encoding="UTF-8" standalone="yes" ?><hh:head xmlns:hh="http://www.hancom.co.kr/hwpml/2011/head" version="1.4"/>',
  );
  sections.forEach((blocks, i) => zip.file(`Contents/section${i}.xml`, sectionXml(blocks)));
  return await zip.generateAsync({ type: 'nodebuffer' });
}

export function makeTempRoot(prefix = 'hwpx-edit-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempRoot(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export async function writeHwpx(
  root: string,
  name: string,
  sections: FixtureBlock[][],
  options?: FixtureOptions,
): Promise<string> {
  const file = path.join(root, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, await buildHwpx(sections, options));
  return file;
}

export async function readSection(file: string, index = 0): Promise<string> {
  const zip = await JSZip.loadAsync(fs.readFileSync(file));
  const part = zip.file(`Contents/section${index}.xml`);
  if (!part) throw new Error(`section${index} missing from ${file}`);
  return await part.async('string');
}

export function testConfig(root: string, overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    root,
    transport: 'stdio',
    host: '127.0.0.1',
    port: 0,
    autoRegisterHandles: true,
    autoBackup: false,
    safetyThreshold: 0.5,
    lockTimeoutMs: 1000,
    logLevel: 'error',
    remote: { allowedOrigins: [], headers: {} },
    ...overrides,
  };
}
