/**
 * Style resolution: merge a partial user config over the academic defaults.
 *
 * Pure: every call returns a new frozen sheet, nothing shared is mutated.
 */

import { DEFAULT_STYLE_SHEET } from '../constants.js';
import type {
    HeaderFooterStyle,
    HeadingStyle,
    HeadingStyleLevel,
    PartialStyleConfig,
    StyleSheet,
} from '../types.js';

/** Field-by-field merge; `undefined` in `override` never masks a default. */
function mergeGroup<T extends object>(defaults: Readonly<T>, override: Partial<T> | undefined): Readonly<T> {
    const merged: T = { ...defaults };
    if (override) {
        for (const key in override) {
            const value = override[key];
            if (value !== undefined) {
                merged[key] = value;
            }
        }
    }
    return Object.freeze(merged);
}

export function resolveStyleSheet(userConfig?: PartialStyleConfig): StyleSheet {
    const cfg = userConfig ?? {};
    const defaults = DEFAULT_STYLE_SHEET;

    const body = mergeGroup(defaults.body, cfg.body);

    const headingFor = (level: HeadingStyleLevel): Readonly<HeadingStyle> =>
        mergeGroup(defaults.headings[level], cfg.headings?.[level]);
    const headings: Record<HeadingStyleLevel, Readonly<HeadingStyle>> = {
        1: headingFor(1),
        2: headingFor(2),
        3: headingFor(3),
    };

    // Header/footer face follows the resolved body face unless set explicitly.
    const headerFooter = mergeGroup<HeaderFooterStyle>(
        { ...defaults.headerFooter, font: body.chineseFont },
        cfg.headerFooter,
    );

    return Object.freeze({
        page: mergeGroup(defaults.page, cfg.page),
        margins: mergeGroup(defaults.margins, cfg.margins),
        body,
        headings: Object.freeze(headings),
        headerFooter,
    });
}
