/**
 * Style application: seed a document's section, named styles and
 * header/footer from a resolved style sheet.
 *
 * Every call overwrites what it sets, so applying the same sheet twice
 * leaves the document as applying it once.
 */

import { HEADING_STYLE_LEVELS } from '../constants.js';
import type { StyleSheet, StyledDocument, StyledRun } from '../types.js';

export function applyStyleSheet(doc: StyledDocument, sheet: StyleSheet, headerText?: string): void {
    // Page geometry and margins
    doc.section.page = { ...sheet.page };
    doc.section.margins = { ...sheet.margins };

    // Normal: both script slots must be set for mixed CJK/Latin runs.
    doc.styles.normal = {
        chineseFont: sheet.body.chineseFont,
        westernFont: sheet.body.westernFont,
        sizePt: sheet.body.sizePt,
        lineSpacingPt: sheet.body.lineSpacingPt,
    };

    for (const level of HEADING_STYLE_LEVELS) {
        const heading = sheet.headings[level];
        doc.styles.headings[level] = {
            font: heading.font,
            sizePt: heading.sizePt,
            alignment: heading.alignment,
            spaceBeforePt: heading.spaceBeforePt,
            spaceAfterPt: heading.spaceAfterPt,
        };
    }

    const { font, sizePt } = sheet.headerFooter;
    const text = headerText || sheet.headerFooter.text;
    if (text) {
        doc.header.paragraphs = [[{ text, font, sizePt }]];
    }

    // Restamp existing footer runs; never invent footer text.
    doc.footer.paragraphs = doc.footer.paragraphs.map((runs) =>
        runs.map((run): StyledRun => ({ ...run, font, sizePt })),
    );
}
