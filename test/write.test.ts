import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AlignmentType, Document, LineRuleType } from 'docx';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { addHeading, addParagraph, createDocument } from '../src/docx/document.js';
import { applyStyleSheet } from '../src/docx/styles/apply.js';
import { resolveStyleSheet } from '../src/docx/styles/resolve.js';
import { renderMarkdown } from '../src/convert.js';
import { DocxError, DocxErrorCode } from '../src/docx/errors.js';
import { buildStylesOptions, packDocx, toDocxDocument, writeDocx } from '../src/docx/write.js';
import type { StyledDocument } from '../src/docx/types.js';

async function documentXml(doc: StyledDocument): Promise<string> {
    const zip = await JSZip.loadAsync(await packDocx(doc));
    const entry = zip.file('word/document.xml');
    if (!entry) throw new Error('word/document.xml missing from package');
    return entry.async('string');
}

function styledDocument(): StyledDocument {
    const doc = createDocument();
    applyStyleSheet(doc, resolveStyleSheet(), 'Thesis');
    addHeading(doc, 1, 'Introduction');
    addParagraph(doc, [{ text: 'Body ' }, { text: 'code', font: 'Consolas' }, { text: '\n' }, { text: 'more' }]);
    addParagraph(doc, [{ text: '• item' }], 20);
    return doc;
}

describe('buildStylesOptions', () => {
    it('maps body fonts per script with exact line spacing', () => {
        const styles = buildStylesOptions(styledDocument());
        expect(styles.default?.document).toEqual({
            run: {
                font: { ascii: 'Times New Roman', hAnsi: 'Times New Roman', eastAsia: 'SimSun' },
                size: 24,
            },
            paragraph: { spacing: { line: 400, lineRule: LineRuleType.EXACT } },
        });
    });

    it('maps heading styles to font, size, alignment and spacing', () => {
        const styles = buildStylesOptions(styledDocument());
        expect(styles.default?.heading1).toEqual({
            run: {
                font: { ascii: 'SimHei', hAnsi: 'SimHei', eastAsia: 'SimHei', cs: 'SimHei' },
                size: 32,
            },
            paragraph: { alignment: AlignmentType.CENTER, spacing: { before: 240, after: 240 } },
        });
        expect(styles.default?.heading2?.paragraph).toEqual({
            alignment: AlignmentType.LEFT,
            spacing: { before: 240, after: 240 },
        });
    });

    it('leaves template spacing alone on an unstyled document', () => {
        const styles = buildStylesOptions(createDocument());
        expect(styles.default?.document?.paragraph).toEqual({});
        expect(styles.default?.heading1).toEqual({ run: {}, paragraph: { spacing: {} } });
    });
});

describe('packDocx / writeDocx', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'md2docx-write-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('builds a docx Document from the model', () => {
        expect(toDocxDocument(styledDocument())).toBeInstanceOf(Document);
    });

    it('packs a zip archive', async () => {
        const buffer = await packDocx(styledDocument());
        expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');
    });

    it('creates missing parent directories', async () => {
        const target = path.join(tempDir, 'nested', 'out.docx');
        await writeDocx(styledDocument(), target);
        const stat = await fs.stat(target);
        expect(stat.size).toBeGreaterThan(0);
    });

    it('writes each line of a multi-line code block after a line break', async () => {
        const xml = await documentXml(renderMarkdown('```\nline1\nline2\n```\n', resolveStyleSheet()));
        expect(xml).toContain('<w:br/>');
        expect(xml).toContain('>line1</w:t>');
        expect(xml).toContain('>line2</w:t>');
        expect(xml).not.toContain('line1\nline2');
        expect(xml.match(/w:ascii="Consolas"/g)).toHaveLength(2);
    });

    it('breaks multi-line blockquote text the same way', async () => {
        const xml = await documentXml(renderMarkdown('> a\n> c\n', resolveStyleSheet()));
        expect(xml).toContain('>&gt; a</w:t>');
        expect(xml).toContain('<w:br/>');
        expect(xml).toContain('>c</w:t>');
    });

    it('reports write failures as DocxError with the output path', async () => {
        const blocker = path.join(tempDir, 'blocker');
        await fs.writeFile(blocker, 'not a directory', 'utf8');
        const target = path.join(blocker, 'out.docx');

        const failure = await writeDocx(styledDocument(), target).catch((error: unknown) => error);
        expect(failure).toBeInstanceOf(DocxError);
        expect(failure).toMatchObject({ code: DocxErrorCode.DOCX_WRITE_FAILED, context: { outputPath: target } });
    });
});
