/**
 * Shared constants for the docx module.
 */

import type { StyleSheet } from './types.js';

// ═══════════════════════════════════════════════════════════════════════
// Academic layout defaults
// ═══════════════════════════════════════════════════════════════════════

const DEFAULT_BODY_CHINESE_FONT = 'SimSun';

export const DEFAULT_STYLE_SHEET: StyleSheet = {
    page: { widthMm: 210, heightMm: 297 },
    margins: { topMm: 30, bottomMm: 25, leftMm: 30, rightMm: 25 },
    body: {
        chineseFont: DEFAULT_BODY_CHINESE_FONT,
        westernFont: 'Times New Roman',
        sizePt: 12,
        lineSpacingPt: 20,
    },
    headings: {
        1: { font: 'SimHei', sizePt: 16, alignment: 'center', spaceBeforePt: 12, spaceAfterPt: 12 },
        2: { font: 'SimHei', sizePt: 14, alignment: 'left', spaceBeforePt: 12, spaceAfterPt: 12 },
        3: { font: 'SimHei', sizePt: 12, alignment: 'left', spaceBeforePt: 12, spaceAfterPt: 12 },
    },
    headerFooter: { font: DEFAULT_BODY_CHINESE_FONT, sizePt: 9 },
};

export const HEADING_STYLE_LEVELS = [1, 2, 3] as const;

// ═══════════════════════════════════════════════════════════════════════
// Rendering literals
// ═══════════════════════════════════════════════════════════════════════

export const MONOSPACE_FONT = 'Consolas';

export const BULLET_GLYPH = '•';

/** Ordered items all use this marker; see DESIGN.md. */
export const ORDERED_MARKER = '1.';

export const LIST_INDENT = '    ';

export const BLOCKQUOTE_PREFIX = '> ';

export const HORIZONTAL_RULE_TEXT = '——————';

// ═══════════════════════════════════════════════════════════════════════
// Blank-document template
// ═══════════════════════════════════════════════════════════════════════

/** Letter page and Calibri body, what a blank Word document starts with. */
export const TEMPLATE_DEFAULTS = {
    pageWidthMm: 215.9,
    pageHeightMm: 279.4,
    marginMm: 25.4,
    font: 'Calibri',
    sizePt: 11,
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Unit conversion
// ═══════════════════════════════════════════════════════════════════════

/** 1pt = 20 twips (twentieths of a point). */
export function pointsToTwips(pt: number): number {
    return Math.round(pt * 20);
}

/** docx run sizes are in half-points. */
export function pointsToHalfPoints(pt: number): number {
    return Math.round(pt * 2);
}
