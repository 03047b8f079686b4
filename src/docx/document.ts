/**
 * In-memory document model filled by the style applier and the builder,
 * serialized by `write.ts`.
 */

import { TEMPLATE_DEFAULTS } from './constants.js';
import type { DocBlock, DocRun, ParagraphBlock, StyledDocument } from './types.js';

/** A blank document, as the stock template would open it. */
export function createDocument(): StyledDocument {
    const margin = TEMPLATE_DEFAULTS.marginMm;
    return {
        section: {
            page: { widthMm: TEMPLATE_DEFAULTS.pageWidthMm, heightMm: TEMPLATE_DEFAULTS.pageHeightMm },
            margins: { topMm: margin, bottomMm: margin, leftMm: margin, rightMm: margin },
        },
        styles: {
            normal: {
                chineseFont: TEMPLATE_DEFAULTS.font,
                westernFont: TEMPLATE_DEFAULTS.font,
                sizePt: TEMPLATE_DEFAULTS.sizePt,
            },
            headings: { 1: {}, 2: {}, 3: {} },
        },
        header: { paragraphs: [] },
        footer: { paragraphs: [] },
        blocks: [],
    };
}

export function addParagraph(doc: StyledDocument, runs: DocRun[] = [], lineSpacingPt?: number): ParagraphBlock {
    const block: ParagraphBlock = { type: 'paragraph', runs };
    if (lineSpacingPt !== undefined) block.lineSpacingPt = lineSpacingPt;
    doc.blocks.push(block);
    return block;
}

export function addHeading(doc: StyledDocument, level: number, text: string): void {
    doc.blocks.push({ type: 'heading', level, text });
}

export function blockText(block: DocBlock): string {
    return block.type === 'heading' ? block.text : block.runs.map((run) => run.text).join('');
}

/** Plain text of the body, one line per block. */
export function documentText(doc: StyledDocument): string {
    return doc.blocks.map(blockText).join('\n');
}
