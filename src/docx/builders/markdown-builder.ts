/**
 * Token stream → styled document blocks.
 *
 * Single forward pass over a balanced token stream. The only state kept
 * across tokens is the stack of open lists. Malformed streams are not
 * defended against; nothing here throws on well-formed input.
 */

import {
    BLOCKQUOTE_PREFIX,
    BULLET_GLYPH,
    HORIZONTAL_RULE_TEXT,
    LIST_INDENT,
    MONOSPACE_FONT,
    ORDERED_MARKER,
} from '../constants.js';
import { addHeading, addParagraph, createDocument } from '../document.js';
import { TokenCursor, isKind } from '../parsers/token-cursor.js';
import { plainText, renderInline } from './inline.js';
import type { ListContext, MarkdownToken, StyleSheet, StyledDocument } from '../types.js';

const isInline = isKind('inline');

function isListOpen(token: MarkdownToken): boolean {
    return token.kind === 'bullet-list-open' || token.kind === 'ordered-list-open';
}

export class MarkdownDocumentBuilder {
    private readonly listStack: ListContext[] = [];

    constructor(
        private readonly doc: StyledDocument,
        private readonly sheet: StyleSheet,
    ) {}

    /** Open list contexts, innermost last. Empty after a balanced stream. */
    get openLists(): readonly ListContext[] {
        return this.listStack;
    }

    build(tokens: readonly MarkdownToken[]): StyledDocument {
        const cursor = new TokenCursor(tokens);
        while (!cursor.done) {
            this.step(cursor);
        }
        return this.doc;
    }

    private step(cursor: TokenCursor): void {
        const token = cursor.peek();
        if (token === undefined) return;

        switch (token.kind) {
            case 'heading-open':
                this.heading(cursor, token.level);
                return;
            case 'paragraph-open':
                this.paragraph(cursor);
                return;
            case 'bullet-list-open':
                this.listStack.push({ kind: 'bullet', depth: this.listStack.length });
                cursor.advance();
                return;
            case 'ordered-list-open':
                this.listStack.push({ kind: 'ordered', depth: this.listStack.length });
                cursor.advance();
                return;
            case 'bullet-list-close':
            case 'ordered-list-close':
                this.listStack.pop();
                cursor.advance();
                return;
            case 'list-item-open':
                this.listItem(cursor);
                return;
            case 'fence':
                addParagraph(this.doc, [{ text: token.content.replace(/\r?\n$/, ''), font: MONOSPACE_FONT }]);
                cursor.advance();
                return;
            case 'blockquote-open':
                this.blockquote(cursor);
                return;
            case 'horizontal-rule':
                addParagraph(this.doc, [{ text: HORIZONTAL_RULE_TEXT }]);
                cursor.advance();
                return;
            default:
                cursor.advance();
        }
    }

    /** heading-open, inline, heading-close */
    private heading(cursor: TokenCursor, level: number): void {
        cursor.advance();
        const inline = cursor.consumeIf(isInline);
        const text = inline ? plainText(inline.children) : '';
        addHeading(this.doc, Math.min(level, 6), text);
        cursor.consumeIf(isKind('heading-close'));
    }

    /** paragraph-open, inline, paragraph-close */
    private paragraph(cursor: TokenCursor): void {
        cursor.advance();
        const inline = cursor.consumeIf(isInline);
        if (inline && inline.children.length > 0) {
            addParagraph(this.doc, renderInline(inline.children));
        } else {
            addParagraph(this.doc);
        }
        cursor.consumeIf(isKind('paragraph-close'));
    }

    /**
     * One paragraph per item. The text scan ends at the item's close, or
     * at a nested list, which is then walked as usual.
     */
    private listItem(cursor: TokenCursor): void {
        cursor.advance();
        let text = '';
        // Nested lists end the scan; their items are walked separately.
        const stop = cursor.scanUntil(
            (token) => token.kind === 'list-item-close' || isListOpen(token),
            (token) => {
                if (isInline(token) && token.children.length > 0) {
                    text = plainText(token.children);
                }
            },
        );
        if (stop?.kind === 'list-item-close') cursor.advance();

        const innermost = this.listStack[this.listStack.length - 1];
        const bullet = innermost?.kind === 'bullet' ? BULLET_GLYPH : ORDERED_MARKER;
        const indent = LIST_INDENT.repeat(Math.max(this.listStack.length - 1, 0));
        addParagraph(this.doc, [{ text: `${indent}${bullet} ${text}` }], this.sheet.body.lineSpacingPt);
    }

    /** Raw inline content, one "> " paragraph per inline token. */
    private blockquote(cursor: TokenCursor): void {
        const lines: string[] = [];
        cursor.skipPastMatching(isKind('blockquote-open'), isKind('blockquote-close'), (token) => {
            if (isInline(token) && token.content) lines.push(token.content);
        });
        for (const line of lines) {
            addParagraph(this.doc, [{ text: `${BLOCKQUOTE_PREFIX}${line}` }]);
        }
    }
}

/** Walk `tokens` into `doc`, or into a fresh document when none is given. */
export function buildDocument(
    tokens: readonly MarkdownToken[],
    sheet: StyleSheet,
    doc: StyledDocument = createDocument(),
): StyledDocument {
    return new MarkdownDocumentBuilder(doc, sheet).build(tokens);
}
