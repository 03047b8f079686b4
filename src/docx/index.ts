/**
 * Markdown → DOCX renderer — public API
 *
 * @module docx
 */

// ── Styles ──────────────────────────────────────────────────────────────────
export { resolveStyleSheet } from './styles/resolve.js';
export { applyStyleSheet } from './styles/apply.js';
export { DEFAULT_STYLE_SHEET } from './constants.js';

// ── Rendering ───────────────────────────────────────────────────────────────
export { parseMarkdown } from './parsers/markdown-tokens.js';
export { TokenCursor } from './parsers/token-cursor.js';
export { MarkdownDocumentBuilder, buildDocument } from './builders/markdown-builder.js';
export { renderInline } from './builders/inline.js';
export { createDocument, documentText } from './document.js';

// ── Writing ─────────────────────────────────────────────────────────────────
export { toDocxDocument, packDocx, writeDocx } from './write.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
    StyleSheet,
    PartialStyleConfig,
    MarkdownToken,
    InlineSpan,
    StyledDocument,
    DocBlock,
    DocRun,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { DocxError, DocxErrorCode } from './errors.js';
