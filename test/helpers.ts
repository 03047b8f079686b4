import type { InlineSpan, MarkdownToken } from '../src/docx/types.js';

export function text(content: string): InlineSpan {
    return { kind: 'text', content };
}

export function inline(children: InlineSpan[], content?: string): MarkdownToken {
    return {
        kind: 'inline',
        content: content ?? children.map((child) => ('content' in child ? child.content : '')).join(''),
        children,
    };
}

export function paragraph(value: string): MarkdownToken[] {
    return [{ kind: 'paragraph-open' }, inline([text(value)]), { kind: 'paragraph-close' }];
}

export function listItem(value: string): MarkdownToken[] {
    return [{ kind: 'list-item-open' }, ...paragraph(value), { kind: 'list-item-close' }];
}
