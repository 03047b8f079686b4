import { describe, expect, it } from 'vitest';
import { plainText, renderInline } from '../src/docx/builders/inline.js';
import type { InlineSpan } from '../src/docx/types.js';

describe('renderInline', () => {
    it('creates one run per text-bearing span', () => {
        const spans: InlineSpan[] = [
            { kind: 'text', content: 'call ' },
            { kind: 'code-inline', content: 'run()' },
            { kind: 'hardbreak' },
            { kind: 'strong-open' },
            { kind: 'text', content: 'done' },
            { kind: 'strong-close' },
        ];
        expect(renderInline(spans)).toEqual([
            { text: 'call ' },
            { text: 'run()', font: 'Consolas' },
            { text: '\n' },
            { text: 'done' },
        ]);
    });

    it('keeps other spans that carry text and drops empty ones', () => {
        const spans: InlineSpan[] = [
            { kind: 'other', type: 'html_inline', content: '<br>' },
            { kind: 'other', type: 's_open', content: '' },
        ];
        expect(renderInline(spans)).toEqual([{ text: '<br>' }]);
    });
});

describe('plainText', () => {
    it('joins text payloads and ignores markers and breaks', () => {
        const spans: InlineSpan[] = [
            { kind: 'em-open' },
            { kind: 'text', content: 'a' },
            { kind: 'em-close' },
            { kind: 'softbreak' },
            { kind: 'code-inline', content: 'b' },
        ];
        expect(plainText(spans)).toBe('ab');
    });
});
