import { describe, expect, it } from 'vitest';
import { DEFAULT_STYLE_SHEET } from '../src/docx/constants.js';
import { resolveStyleSheet } from '../src/docx/styles/resolve.js';
import type { PartialStyleConfig } from '../src/docx/types.js';

describe('resolveStyleSheet', () => {
    it('returns the academic defaults when no config is given', () => {
        const sheet = resolveStyleSheet();
        expect(sheet.page).toEqual({ widthMm: 210, heightMm: 297 });
        expect(sheet.margins).toEqual({ topMm: 30, bottomMm: 25, leftMm: 30, rightMm: 25 });
        expect(sheet.body).toEqual({
            chineseFont: 'SimSun',
            westernFont: 'Times New Roman',
            sizePt: 12,
            lineSpacingPt: 20,
        });
        expect(sheet.headings[1]).toEqual({
            font: 'SimHei',
            sizePt: 16,
            alignment: 'center',
            spaceBeforePt: 12,
            spaceAfterPt: 12,
        });
        expect(sheet.headings[2].alignment).toBe('left');
        expect(sheet.headings[3].sizePt).toBe(12);
        expect(sheet.headerFooter).toEqual({ font: 'SimSun', sizePt: 9 });
    });

    it('keeps supplied fields and fills the rest from defaults', () => {
        const sheet = resolveStyleSheet({
            body: { sizePt: 14 },
            headings: { 2: { alignment: 'center' } },
            margins: { leftMm: 35 },
        });
        expect(sheet.body).toEqual({
            chineseFont: 'SimSun',
            westernFont: 'Times New Roman',
            sizePt: 14,
            lineSpacingPt: 20,
        });
        expect(sheet.headings[2]).toEqual({
            font: 'SimHei',
            sizePt: 14,
            alignment: 'center',
            spaceBeforePt: 12,
            spaceAfterPt: 12,
        });
        expect(sheet.margins).toEqual({ topMm: 30, bottomMm: 25, leftMm: 35, rightMm: 25 });
    });

    it.each<[string, PartialStyleConfig]>([
        ['page', { page: { heightMm: 280 } }],
        ['margins', { margins: { bottomMm: 20 } }],
        ['body', { body: { westernFont: 'Arial' } }],
        ['headings', { headings: { 3: { spaceAfterPt: 6 } } }],
        ['header/footer', { headerFooter: { sizePt: 10.5, text: 'Thesis' } }],
    ])('leaves no field unset when only %s is supplied', (_group, config) => {
        const sheet = resolveStyleSheet(config);
        const groups = [
            sheet.page,
            sheet.margins,
            sheet.body,
            sheet.headings[1],
            sheet.headings[2],
            sheet.headings[3],
        ];
        for (const group of groups) {
            for (const value of Object.values(group)) {
                expect(value).toBeDefined();
            }
        }
        expect(sheet.headerFooter.font).toBeDefined();
        expect(sheet.headerFooter.sizePt).toBeDefined();
    });

    it('does not let an undefined value mask a default', () => {
        const sheet = resolveStyleSheet({ page: { widthMm: undefined, heightMm: 250 } });
        expect(sheet.page).toEqual({ widthMm: 210, heightMm: 250 });
    });

    it('defaults the header/footer face to the resolved body face', () => {
        expect(resolveStyleSheet({ body: { chineseFont: 'KaiTi' } }).headerFooter.font).toBe('KaiTi');
        expect(
            resolveStyleSheet({ body: { chineseFont: 'KaiTi' }, headerFooter: { font: 'FangSong' } }).headerFooter.font,
        ).toBe('FangSong');
    });

    it('returns frozen sheets and never mutates the defaults', () => {
        const sheet = resolveStyleSheet({ body: { sizePt: 10 } });
        expect(Object.isFrozen(sheet)).toBe(true);
        expect(Object.isFrozen(sheet.body)).toBe(true);
        expect(Object.isFrozen(sheet.headings[1])).toBe(true);
        expect(DEFAULT_STYLE_SHEET.body.sizePt).toBe(12);
        expect(resolveStyleSheet().body.sizePt).toBe(12);
    });
});
