/**
 * convertMarkdownFile - end-to-end Markdown → .docx/.doc conversion.
 *
 *   1. Validate input and output paths
 *   2. Load config and resolve the style sheet
 *   3. pandoc if available (engine 'auto' / 'pandoc'), else the built-in renderer
 *   4. Optional .doc export through LibreOffice
 */

import fs from 'fs/promises';
import path from 'path';
import { loadStyleConfig } from './config.js';
import { convertDocxToDoc } from './converters/libreoffice.js';
import { convertWithPandoc } from './converters/pandoc.js';
import { buildDocument } from './docx/builders/markdown-builder.js';
import { createDocument } from './docx/document.js';
import { parseMarkdown } from './docx/parsers/markdown-tokens.js';
import { applyStyleSheet } from './docx/styles/apply.js';
import { resolveStyleSheet } from './docx/styles/resolve.js';
import { writeDocx } from './docx/write.js';
import type { ConvertOptions, ConvertResult, StyleSheet, StyledDocument } from './docx/types.js';
import { ConversionError, ConversionErrorCode } from './errors.js';
import { logToStderr, logger } from './utils/logger.js';

export interface OutputPlan {
    outputPath: string;
    docxPath: string;
    format: 'docx' | 'doc';
}

/** Where the final file and the intermediate .docx go. */
export function planOutput(inputPath: string, outputPath?: string): OutputPlan {
    const input = path.resolve(inputPath);
    if (!outputPath) {
        const docxPath = path.join(path.dirname(input), `${path.basename(input, path.extname(input))}.docx`);
        return { outputPath: docxPath, docxPath, format: 'docx' };
    }

    const output = path.resolve(outputPath);
    const ext = path.extname(output).toLowerCase();
    if (ext === '.docx') {
        return { outputPath: output, docxPath: output, format: 'docx' };
    }
    if (ext === '.doc') {
        return { outputPath: output, docxPath: `${output.slice(0, -ext.length)}.docx`, format: 'doc' };
    }
    throw new ConversionError('Only .docx or .doc output is supported', ConversionErrorCode.UNSUPPORTED_OUTPUT, {
        outputPath: output,
    });
}

/** Built-in renderer: Markdown text → styled document model. */
export function renderMarkdown(markdown: string, sheet: StyleSheet, headerText?: string): StyledDocument {
    const doc = createDocument();
    applyStyleSheet(doc, sheet, headerText);
    return buildDocument(parseMarkdown(markdown), sheet, doc);
}

async function convertBuiltin(
    inputPath: string,
    docxPath: string,
    sheet: StyleSheet,
    headerText?: string,
): Promise<void> {
    try {
        const markdown = await fs.readFile(inputPath, 'utf8');
        await writeDocx(renderMarkdown(markdown, sheet, headerText), docxPath);
    } catch (error) {
        throw new ConversionError(
            'Fallback conversion failed',
            ConversionErrorCode.BUILTIN_FAILED,
            { inputPath, docxPath },
            { cause: error },
        );
    }
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

export async function convertMarkdownFile(options: ConvertOptions): Promise<ConvertResult> {
    const inputPath = path.resolve(options.input);
    if (!(await fileExists(inputPath))) {
        throw new ConversionError(`Input file not found: ${inputPath}`, ConversionErrorCode.INPUT_NOT_FOUND, {
            inputPath,
        });
    }

    const plan = planOutput(inputPath, options.output);

    const { config, warnings } = await loadStyleConfig(options.config);
    for (const warning of warnings) {
        logToStderr('warning', warning);
    }
    const sheet = resolveStyleSheet(config);
    const engine = options.engine ?? 'auto';

    let used: ConvertResult['engine'];
    if (engine !== 'builtin' && await convertWithPandoc(inputPath, plan.docxPath, sheet, options.header)) {
        used = 'pandoc';
    } else if (engine === 'pandoc') {
        throw new ConversionError('pandoc conversion failed or pandoc is not installed', ConversionErrorCode.PANDOC_FAILED, {
            inputPath,
        });
    } else {
        logger.debug('Using built-in renderer for', inputPath);
        await convertBuiltin(inputPath, plan.docxPath, sheet, options.header);
        used = 'builtin';
    }

    if (plan.format === 'doc' && !(await convertDocxToDoc(plan.docxPath, plan.outputPath))) {
        throw new ConversionError(
            '.docx was written but .doc export failed (LibreOffice is required)',
            ConversionErrorCode.DOC_EXPORT_FAILED,
            { docxPath: plan.docxPath },
        );
    }

    return { outputPath: plan.outputPath, docxPath: plan.docxPath, engine: used, warnings };
}
