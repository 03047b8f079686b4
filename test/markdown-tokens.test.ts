import { describe, expect, it } from 'vitest';
import { parseMarkdown } from '../src/docx/parsers/markdown-tokens.js';

describe('parseMarkdown', () => {
    it('maps a heading to open, inline and close tokens', () => {
        expect(parseMarkdown('### Methods')).toEqual([
            { kind: 'heading-open', level: 3 },
            { kind: 'inline', content: 'Methods', children: [{ kind: 'text', content: 'Methods' }] },
            { kind: 'heading-close', level: 3 },
        ]);
    });

    it('maps list tokens by kind', () => {
        const kinds = parseMarkdown('1. one\n').map((token) => token.kind);
        expect(kinds).toEqual([
            'ordered-list-open',
            'list-item-open',
            'paragraph-open',
            'inline',
            'paragraph-close',
            'list-item-close',
            'ordered-list-close',
        ]);
    });

    it('treats indented code as a code block', () => {
        expect(parseMarkdown('    let x = 1;\n')).toEqual([{ kind: 'fence', content: 'let x = 1;\n', info: '' }]);
    });

    it('keeps the fence info string', () => {
        expect(parseMarkdown('```ts\nconst a = 1;\n```\n')).toEqual([
            { kind: 'fence', content: 'const a = 1;\n', info: 'ts' },
        ]);
    });

    it('carries link targets on link-open spans', () => {
        const [, inlineToken] = parseMarkdown('[docs](https://example.com/docs)');
        expect(inlineToken).toEqual({
            kind: 'inline',
            content: '[docs](https://example.com/docs)',
            children: [
                { kind: 'link-open', href: 'https://example.com/docs' },
                { kind: 'text', content: 'docs' },
                { kind: 'link-close' },
            ],
        });
    });

    it('enables tables and reports them as other tokens', () => {
        const tokens = parseMarkdown('| a | b |\n| - | - |\n| 1 | 2 |\n');
        expect(tokens[0]).toEqual({ kind: 'other', type: 'table_open' });
    });

    it('maps a thematic break', () => {
        expect(parseMarkdown('---\n')).toEqual([{ kind: 'horizontal-rule' }]);
    });
});
