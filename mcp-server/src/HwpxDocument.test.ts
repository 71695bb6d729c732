import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { HwpxDocument } from './HwpxDocument';
import { buildHwpx } from './test-helpers';

async function load(...sections: Parameters<typeof buildHwpx>[0]): Promise<HwpxDocument> {
  return HwpxDocument.load(await buildHwpx(sections, { title: 'Quarterly report', meta: { creator: 'Tester' } }));
}

describe('HwpxDocument - loading', () => {
  it('indexes paragraphs and tables across sections with global numbering', async () => {
    const doc = await load(['First', 'Second 2025', { table: [['A', 'B'], ['C', 'D']] }], ['Other section']);

    expect(doc.sectionCount).toBe(2);
    expect(doc.revision).toBe(1);
    expect(doc.paragraphs.map((p) => p.text)).toEqual(['First', 'Second 2025', '', 'Other section']);
    expect(doc.paragraphs.map((p) => p.sectionIndex)).toEqual([0, 0, 0, 1]);
    expect(doc.paragraphs[2].tableIndexes).toEqual([0]);
    expect(doc.paragraphs[3].location).toEqual({ type: 'paragraph', paragraphIndex: 3, sectionIndex: 1 });

    expect(doc.tables).toHaveLength(1);
    expect(doc.tables[0].rowCount).toBe(2);
    expect(doc.tables[0].colCount).toBe(2);
    expect(doc.tables[0].cells.map((row) => row.map((cell) => cell.text))).toEqual([
      ['A', 'B'],
      ['C', 'D'],
    ]);
    expect(doc.tables[0].cells[1][0].key).toBe('c:0:1:0');

    // 4 top-level paragraphs + 4 cells
    expect(doc.nodeCount).toBe(8);
    expect(doc.getAllText()).toBe('First\nSecond 2025\n\nOther section');
  });

  it('reads title and named metadata from content.hpf', async () => {
    const doc = await load(['Body']);
    expect(doc.getMetadata()).toEqual({ title: 'Quarterly report', creator: 'Tester' });
  });

  it('unescapes entities and maps tabs and line breaks to characters', async () => {
    const doc = await load([
      'A & B <c>',
      {
        raw:
          '<hp:p id="90" paraPrIDRef="0" styleIDRef="0"><hp:run charPrIDRef="0">' +
          '<hp:t>a<hp:tab width="100"/>b</hp:t><hp:t>c<hp:lineBreak/>d</hp:t></hp:run></hp:p>',
      },
    ]);

    expect(doc.paragraphs[0].text).toBe('A & B <c>');
    expect(doc.paragraphs[1].text).toBe('a\tbc\nd');
    expect(doc.paragraphs[1].segments.map((s) => [s.from, s.to, s.plain])).toEqual([
      [0, 3, false],
      [3, 6, false],
    ]);
  });

  it('leaves header and footer text out of the paragraph body', async () => {
    const doc = await load([
      {
        raw:
          '<hp:p id="91" paraPrIDRef="0" styleIDRef="0"><hp:run charPrIDRef="0"><hp:ctrl><hp:header>' +
          '<hp:subList><hp:p id="92"><hp:run charPrIDRef="0"><hp:t>HEADER</hp:t></hp:run></hp:p></hp:subList>' +
          '</hp:header></hp:ctrl><hp:t>Body</hp:t></hp:run></hp:p>',
      },
    ]);

    expect(doc.paragraphs).toHaveLength(1);
    expect(doc.paragraphs[0].text).toBe('Body');
  });

  it('treats a self-closing paragraph as empty', async () => {
    const doc = await load([{ raw: '<hp:p id="5" paraPrIDRef="0" styleIDRef="0"/>' }, 'Next']);

    expect(doc.paragraphs.map((p) => p.text)).toEqual(['', 'Next']);
    expect(doc.paragraphs[0].segments).toEqual([]);
  });

  it('rejects data that is not a zip archive', async () => {
    await expect(HwpxDocument.load(Buffer.from('not a zip'))).rejects.toMatchObject({ code: 'DOCUMENT_INVALID' });
  });

  it('rejects a package without section0', async () => {
    const zip = new JSZip();
    zip.file('mimetype', 'application/hwp+zip');
    const data = await zip.generateAsync({ type: 'nodebuffer' });

    await expect(HwpxDocument.load(data)).rejects.toMatchObject({
      code: 'DOCUMENT_INVALID',
      message: 'HWPX package has no Contents/section0.xml',
    });
  });
});

describe('HwpxDocument - staging and commit', () => {
  it('keeps staged changes invisible until commit', async () => {
    const doc = await load(['First', 'Second']);
    const segment = doc.paragraphs[0].segments[0];

    doc.stage([{ sectionIndex: 0, start: segment.start, end: segment.end, text: '<hp:t>Changed</hp:t>' }]);
    expect(doc.hasPendingChanges).toBe(true);
    expect(doc.paragraphs[0].text).toBe('First');

    const reloaded = await HwpxDocument.load(await doc.serialize());
    expect(reloaded.paragraphs.map((p) => p.text)).toEqual(['Changed', 'Second']);

    doc.commitPending();
    expect(doc.hasPendingChanges).toBe(false);
    expect(doc.revision).toBe(2);
    expect(doc.paragraphs[0].text).toBe('Changed');
  });

  it('drops staged changes on discard', async () => {
    const doc = await load(['First']);
    const segment = doc.paragraphs[0].segments[0];

    doc.stage([{ sectionIndex: 0, start: segment.start, end: segment.end, text: '<hp:t>Changed</hp:t>' }]);
    doc.discardPending();
    doc.commitPending();

    expect(doc.revision).toBe(1);
    expect(doc.paragraphs[0].text).toBe('First');
  });

  it('refuses patches that would break the section XML', async () => {
    const doc = await load(['First']);
    const segment = doc.paragraphs[0].segments[0];

    expect(() => doc.stage([{ sectionIndex: 0, start: segment.start, end: segment.end, text: '<hp:t' }])).toThrow(
      'Section 0 would be corrupted: broken tag structure',
    );
    expect(doc.hasPendingChanges).toBe(false);
  });

  it('refuses overlapping patches', async () => {
    const doc = await load(['First']);
    const p = doc.paragraphs[0];

    expect(() =>
      doc.stage([
        { sectionIndex: 0, start: p.span.start, end: p.span.end, text: '' },
        { sectionIndex: 0, start: p.segments[0].start, end: p.segments[0].end, text: '<hp:t>x</hp:t>' },
      ]),
    ).toThrow(/Overlapping XML patches/);
  });
});

describe('HwpxDocument.verifyPackage', () => {
  it('accepts a complete package', async () => {
    await expect(HwpxDocument.verifyPackage(await buildHwpx([['Body']]))).resolves.toBeUndefined();
  });

  it('reports missing required parts', async () => {
    const zip = await JSZip.loadAsync(await buildHwpx([['Body']]));
    zip.remove('Contents/header.xml');
    const data = await zip.generateAsync({ type: 'nodebuffer' });

    await expect(HwpxDocument.verifyPackage(data)).rejects.toMatchObject({
      code: 'DOCUMENT_INVALID',
      message: 'Missing required files: Contents/header.xml',
    });
  });

  it('reports a truncated section', async () => {
    const zip = await JSZip.loadAsync(await buildHwpx([['Body']]));
    zip.file('Contents/section0.xml', '<?xml version="1.0"?><hs:sec><hp:p');
    const data = await zip.generateAsync({ type: 'nodebuffer' });

    await expect(HwpxDocument.verifyPackage(data)).rejects.toMatchObject({
      message: 'Invalid XML in Contents/section0.xml: truncated XML',
    });
  });
});
