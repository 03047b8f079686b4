/**
 * Style configuration file loading.
 *
 * Accepts YAML (`.yml`/`.yaml`) or JSON in the layout-file format below and
 * maps it onto a partial style sheet. An invalid field is dropped with a
 * warning; an unreadable or unparsable file is reported the same way and
 * conversion continues on defaults.
 *
 * ```yaml
 * page: { width_mm: 210, height_mm: 297 }
 * margins: { top_mm: 30, bottom_mm: 25, left_mm: 30, right_mm: 25 }
 * normal: { chinese: SimSun, western: Times New Roman, size_pt: 12, line_spacing_pt: 20 }
 * headings:
 *   Heading 1: { family: SimHei, size_pt: 16, align: CENTER, space_before_pt: 12, space_after_pt: 12 }
 * header: { text: My Thesis, family: SimSun, size_pt: 9 }
 * ```
 */

import fs from 'fs/promises';
import path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { HeadingStyle, PartialStyleConfig } from './docx/types.js';

const length = z.number().positive();

const AlignSchema = z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['left', 'center', 'right', 'justify']));

const HeadingConfigSchema = z.object({
    family: z.string().optional(),
    size_pt: length.optional(),
    align: AlignSchema.optional(),
    space_before_pt: z.number().nonnegative().optional(),
    space_after_pt: z.number().nonnegative().optional(),
});

export const StyleConfigFileSchema = z.object({
    page: z.object({
        width_mm: length.optional(),
        height_mm: length.optional(),
    }).optional(),
    margins: z.object({
        top_mm: z.number().nonnegative().optional(),
        bottom_mm: z.number().nonnegative().optional(),
        left_mm: z.number().nonnegative().optional(),
        right_mm: z.number().nonnegative().optional(),
    }).optional(),
    normal: z.object({
        chinese: z.string().optional(),
        western: z.string().optional(),
        size_pt: length.optional(),
        line_spacing_pt: length.optional(),
    }).optional(),
    headings: z.object({
        'Heading 1': HeadingConfigSchema.optional(),
        'Heading 2': HeadingConfigSchema.optional(),
        'Heading 3': HeadingConfigSchema.optional(),
    }).optional(),
    header: z.object({
        text: z.string().optional(),
        family: z.string().optional(),
        size_pt: length.optional(),
    }).optional(),
});

export type StyleConfigFile = z.infer<typeof StyleConfigFileSchema>;
type HeadingConfig = z.infer<typeof HeadingConfigSchema>;

export interface LoadedStyleConfig {
    config?: PartialStyleConfig;
    warnings: string[];
}

/** Drop keys whose value is undefined. */
function defined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) result[key] = value[key];
    }
    return result;
}

function mapHeading(heading: HeadingConfig | undefined): Partial<HeadingStyle> | undefined {
    if (!heading) return undefined;
    return defined({
        font: heading.family,
        sizePt: heading.size_pt,
        alignment: heading.align,
        spaceBeforePt: heading.space_before_pt,
        spaceAfterPt: heading.space_after_pt,
    });
}

/** Map the file's snake_case layout onto the style sheet's groups. */
export function toPartialStyleConfig(file: StyleConfigFile): PartialStyleConfig {
    const config: PartialStyleConfig = {};
    if (file.page) {
        config.page = defined({ widthMm: file.page.width_mm, heightMm: file.page.height_mm });
    }
    if (file.margins) {
        config.margins = defined({
            topMm: file.margins.top_mm,
            bottomMm: file.margins.bottom_mm,
            leftMm: file.margins.left_mm,
            rightMm: file.margins.right_mm,
        });
    }
    if (file.normal) {
        config.body = defined({
            chineseFont: file.normal.chinese,
            westernFont: file.normal.western,
            sizePt: file.normal.size_pt,
            lineSpacingPt: file.normal.line_spacing_pt,
        });
    }
    if (file.headings) {
        config.headings = defined({
            1: mapHeading(file.headings['Heading 1']),
            2: mapHeading(file.headings['Heading 2']),
            3: mapHeading(file.headings['Heading 3']),
        });
    }
    if (file.header) {
        config.headerFooter = defined({
            text: file.header.text,
            font: file.header.family,
            sizePt: file.header.size_pt,
        });
    }
    return config;
}

function isYamlPath(filePath: string): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return ext === '.yml' || ext === '.yaml';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Remove the value at `keys`; false when the path does not lead anywhere. */
function dropAt(root: Record<string, unknown>, keys: readonly (string | number)[]): boolean {
    let node: unknown = root;
    for (const key of keys.slice(0, -1)) {
        if (!isRecord(node)) return false;
        node = node[String(key)];
    }
    const last = keys[keys.length - 1];
    if (last === undefined || !isRecord(node) || !(String(last) in node)) return false;
    delete node[String(last)];
    return true;
}

export interface ParsedStyleConfig {
    config: PartialStyleConfig;
    warnings: string[];
}

/**
 * Parse config text. A field that fails validation is dropped with a
 * warning naming its path; the remaining fields are kept. Throws on syntax
 * errors and when the document is not a mapping.
 */
export function parseStyleConfig(text: string, format: 'yaml' | 'json'): ParsedStyleConfig {
    const loaded: unknown = format === 'yaml' ? yaml.load(text) : JSON.parse(text);
    // An empty YAML document loads as undefined.
    const raw = structuredClone(loaded ?? {});
    if (!isRecord(raw)) {
        throw new Error('invalid style config: expected a mapping at the top level');
    }

    const warnings: string[] = [];
    for (;;) {
        const parsed = StyleConfigFileSchema.safeParse(raw);
        if (parsed.success) {
            return { config: toPartialStyleConfig(parsed.data), warnings };
        }
        let dropped = false;
        for (const issue of parsed.error.issues) {
            if (dropAt(raw, issue.path)) {
                warnings.push(`Ignoring config value ${issue.path.join('.')}: ${issue.message}`);
                dropped = true;
            }
        }
        if (!dropped) {
            throw new Error(`invalid style config: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
        }
    }
}

export async function loadStyleConfig(configPath?: string): Promise<LoadedStyleConfig> {
    if (!configPath) return { warnings: [] };

    const absPath = path.resolve(configPath);
    let text: string;
    try {
        text = await fs.readFile(absPath, 'utf8');
    } catch (error) {
        const code = error instanceof Error && 'code' in error ? error.code : undefined;
        const warning = code === 'ENOENT'
            ? `Config file not found: ${absPath}`
            : `Failed to read config: ${error instanceof Error ? error.message : String(error)}`;
        return { warnings: [warning] };
    }

    try {
        return parseStyleConfig(text, isYamlPath(absPath) ? 'yaml' : 'json');
    } catch (error) {
        return { warnings: [`Failed to load config: ${error instanceof Error ? error.message : String(error)}`] };
    }
}
