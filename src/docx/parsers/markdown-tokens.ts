/**
 * Markdown → token stream.
 *
 * markdown-it does the parsing; this module only narrows its tokens to
 * the `MarkdownToken` union the builder walks.
 */

import MarkdownIt from 'markdown-it';
import type { InlineSpan, MarkdownToken } from '../types.js';

type MdItToken = ReturnType<MarkdownIt['parse']>[number];

let parser: MarkdownIt | null = null;

function getParser(): MarkdownIt {
    if (!parser) {
        parser = new MarkdownIt('commonmark').enable(['table', 'strikethrough']);
    }
    return parser;
}

function headingLevel(tag: string): number {
    const match = /^h([1-6])$/.exec(tag);
    return match ? Number(match[1]) : 1;
}

export function toInlineSpan(child: MdItToken): InlineSpan {
    switch (child.type) {
        case 'text':
            return { kind: 'text', content: child.content };
        case 'code_inline':
            return { kind: 'code-inline', content: child.content };
        case 'softbreak':
            return { kind: 'softbreak' };
        case 'hardbreak':
            return { kind: 'hardbreak' };
        case 'em_open':
            return { kind: 'em-open' };
        case 'em_close':
            return { kind: 'em-close' };
        case 'strong_open':
            return { kind: 'strong-open' };
        case 'strong_close':
            return { kind: 'strong-close' };
        case 'link_open': {
            const href = child.attrGet('href');
            return href === null ? { kind: 'link-open' } : { kind: 'link-open', href };
        }
        case 'link_close':
            return { kind: 'link-close' };
        default:
            return { kind: 'other', type: child.type, content: child.content };
    }
}

export function toMarkdownToken(token: MdItToken): MarkdownToken {
    switch (token.type) {
        case 'heading_open':
            return { kind: 'heading-open', level: headingLevel(token.tag) };
        case 'heading_close':
            return { kind: 'heading-close', level: headingLevel(token.tag) };
        case 'paragraph_open':
            return { kind: 'paragraph-open' };
        case 'paragraph_close':
            return { kind: 'paragraph-close' };
        case 'inline':
            return {
                kind: 'inline',
                content: token.content,
                children: (token.children ?? []).map(toInlineSpan),
            };
        case 'bullet_list_open':
            return { kind: 'bullet-list-open' };
        case 'bullet_list_close':
            return { kind: 'bullet-list-close' };
        case 'ordered_list_open':
            return { kind: 'ordered-list-open' };
        case 'ordered_list_close':
            return { kind: 'ordered-list-close' };
        case 'list_item_open':
            return { kind: 'list-item-open' };
        case 'list_item_close':
            return { kind: 'list-item-close' };
        case 'fence':
        case 'code_block':
            return { kind: 'fence', content: token.content, info: token.info };
        case 'blockquote_open':
            return { kind: 'blockquote-open' };
        case 'blockquote_close':
            return { kind: 'blockquote-close' };
        case 'hr':
            return { kind: 'horizontal-rule' };
        default:
            return { kind: 'other', type: token.type };
    }
}

export function parseMarkdown(source: string): MarkdownToken[] {
    return getParser().parse(source, {}).map(toMarkdownToken);
}
