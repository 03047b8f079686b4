/**
 * Inline spans → paragraph runs.
 *
 * Emphasis, strong and link markers are consumed without changing run
 * formatting; only inline code gets a font override.
 */

import { MONOSPACE_FONT } from '../constants.js';
import type { DocRun, InlineSpan } from '../types.js';

/** Direct text payload of a span, if it has one. */
export function spanText(span: InlineSpan): string {
    switch (span.kind) {
        case 'text':
        case 'code-inline':
        case 'other':
            return span.content;
        default:
            return '';
    }
}

/** Concatenated text of spans, used for headings and list items. */
export function plainText(spans: readonly InlineSpan[]): string {
    return spans.map(spanText).join('');
}

export function renderInline(spans: readonly InlineSpan[]): DocRun[] {
    const runs: DocRun[] = [];
    for (const span of spans) {
        switch (span.kind) {
            case 'text':
                runs.push({ text: span.content });
                break;
            case 'code-inline':
                runs.push({ text: span.content, font: MONOSPACE_FONT });
                break;
            case 'softbreak':
            case 'hardbreak':
                runs.push({ text: '\n' });
                break;
            case 'em-open':
            case 'em-close':
            case 'strong-open':
            case 'strong-close':
            case 'link-open':
            case 'link-close':
                break;
            case 'other':
                if (span.content) runs.push({ text: span.content });
                break;
        }
    }
    return runs;
}
