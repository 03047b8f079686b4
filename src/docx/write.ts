/**
 * Document model → .docx via the `docx` package.
 */

import fs from 'fs/promises';
import path from 'path';
import {
    AlignmentType,
    Document,
    Footer,
    Header,
    HeadingLevel,
    LineRuleType,
    Packer,
    Paragraph,
    TextRun,
    convertMillimetersToTwip,
} from 'docx';
import type { IStylesOptions } from 'docx';
import { pointsToHalfPoints, pointsToTwips } from './constants.js';
import { DocxErrorCode, withDocxError } from './errors.js';
import type {
    DocBlock,
    DocRun,
    HeaderFooterPart,
    NamedHeadingStyle,
    ParagraphAlignment,
    StyledDocument,
    StyledRun,
} from './types.js';

type Alignment = (typeof AlignmentType)[keyof typeof AlignmentType];
type Heading = (typeof HeadingLevel)[keyof typeof HeadingLevel];

const ALIGNMENTS: Record<ParagraphAlignment, Alignment> = {
    left: AlignmentType.LEFT,
    center: AlignmentType.CENTER,
    right: AlignmentType.RIGHT,
    justify: AlignmentType.JUSTIFIED,
};

const HEADINGS: Record<number, Heading> = {
    1: HeadingLevel.HEADING_1,
    2: HeadingLevel.HEADING_2,
    3: HeadingLevel.HEADING_3,
    4: HeadingLevel.HEADING_4,
    5: HeadingLevel.HEADING_5,
    6: HeadingLevel.HEADING_6,
};

/** Same face in every script slot. */
function uniformFont(name: string) {
    return { ascii: name, hAnsi: name, eastAsia: name, cs: name };
}

function exactSpacing(pt: number) {
    return { line: pointsToTwips(pt), lineRule: LineRuleType.EXACT };
}

function headingStyle(style: NamedHeadingStyle) {
    return {
        run: {
            ...(style.font !== undefined && { font: uniformFont(style.font) }),
            ...(style.sizePt !== undefined && { size: pointsToHalfPoints(style.sizePt) }),
        },
        paragraph: {
            ...(style.alignment !== undefined && { alignment: ALIGNMENTS[style.alignment] }),
            spacing: {
                ...(style.spaceBeforePt !== undefined && { before: pointsToTwips(style.spaceBeforePt) }),
                ...(style.spaceAfterPt !== undefined && { after: pointsToTwips(style.spaceAfterPt) }),
            },
        },
    };
}

export function buildStylesOptions(doc: StyledDocument): IStylesOptions {
    const normal = doc.styles.normal;
    return {
        default: {
            document: {
                run: {
                    font: {
                        ascii: normal.westernFont,
                        hAnsi: normal.westernFont,
                        eastAsia: normal.chineseFont,
                    },
                    size: pointsToHalfPoints(normal.sizePt),
                },
                paragraph: normal.lineSpacingPt !== undefined
                    ? { spacing: exactSpacing(normal.lineSpacingPt) }
                    : {},
            },
            heading1: headingStyle(doc.styles.headings[1]),
            heading2: headingStyle(doc.styles.headings[2]),
            heading3: headingStyle(doc.styles.headings[3]),
        },
    };
}

/** One `TextRun` per line; every line after the first starts with a `<w:br/>`. */
function toTextRuns(run: DocRun): TextRun[] {
    const font = run.font !== undefined ? { font: uniformFont(run.font) } : {};
    return run.text.split('\n').flatMap((line, index) => {
        if (index === 0) {
            return line ? [new TextRun({ text: line, ...font })] : [];
        }
        return [new TextRun({ text: line, break: 1, ...font })];
    });
}

function toStyledTextRun(run: StyledRun): TextRun {
    return new TextRun({
        text: run.text,
        ...(run.font !== undefined && { font: uniformFont(run.font) }),
        ...(run.sizePt !== undefined && { size: pointsToHalfPoints(run.sizePt) }),
    });
}

function toParagraph(block: DocBlock): Paragraph {
    if (block.type === 'heading') {
        return new Paragraph({
            heading: HEADINGS[block.level] ?? HeadingLevel.HEADING_6,
            children: [new TextRun(block.text)],
        });
    }
    return new Paragraph({
        children: block.runs.flatMap(toTextRuns),
        ...(block.lineSpacingPt !== undefined && { spacing: exactSpacing(block.lineSpacingPt) }),
    });
}

function partParagraphs(part: HeaderFooterPart): Paragraph[] {
    return part.paragraphs.map((runs) => new Paragraph({ children: runs.map(toStyledTextRun) }));
}

/** Map the model onto a `docx` Document (one section). */
export function toDocxDocument(doc: StyledDocument): Document {
    const { page, margins } = doc.section;
    const header = partParagraphs(doc.header);
    const footer = partParagraphs(doc.footer);

    return new Document({
        styles: buildStylesOptions(doc),
        sections: [
            {
                properties: {
                    page: {
                        size: {
                            width: convertMillimetersToTwip(page.widthMm),
                            height: convertMillimetersToTwip(page.heightMm),
                        },
                        margin: {
                            top: convertMillimetersToTwip(margins.topMm),
                            bottom: convertMillimetersToTwip(margins.bottomMm),
                            left: convertMillimetersToTwip(margins.leftMm),
                            right: convertMillimetersToTwip(margins.rightMm),
                        },
                    },
                },
                ...(header.length > 0 && { headers: { default: new Header({ children: header }) } }),
                ...(footer.length > 0 && { footers: { default: new Footer({ children: footer }) } }),
                children: doc.blocks.map(toParagraph),
            },
        ],
    });
}

export async function packDocx(doc: StyledDocument): Promise<Buffer> {
    return withDocxError(DocxErrorCode.DOCX_CREATE_FAILED, { blocks: doc.blocks.length }, () =>
        Packer.toBuffer(toDocxDocument(doc)),
    );
}

export async function writeDocx(doc: StyledDocument, outputPath: string): Promise<void> {
    const buffer = await packDocx(doc);
    await withDocxError(DocxErrorCode.DOCX_WRITE_FAILED, { outputPath }, async () => {
        await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
        await fs.writeFile(outputPath, buffer);
    });
}
