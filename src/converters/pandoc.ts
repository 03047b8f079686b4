/**
 * Preferred conversion path: pandoc with a generated reference document
 * carrying the resolved page setup and styles.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createDocument, addParagraph } from '../docx/document.js';
import { applyStyleSheet } from '../docx/styles/apply.js';
import { writeDocx } from '../docx/write.js';
import type { StyleSheet } from '../docx/types.js';
import { logToStderr } from '../utils/logger.js';
import { execFileAsync, findExecutable } from './exec.js';

export const PANDOC_INPUT_FORMAT = 'markdown+tex_math_dollars+pipe_tables+table_captions';

/** Empty document whose styles.xml pandoc copies into its output. */
export async function writeReferenceDocx(
    referencePath: string,
    sheet: StyleSheet,
    headerText?: string,
): Promise<void> {
    const doc = createDocument();
    applyStyleSheet(doc, sheet, headerText);
    // One paragraph so the styles are written out.
    addParagraph(doc, [{ text: '' }]);
    await writeDocx(doc, referencePath);
}

export function pandocArgs(inputPath: string, outputPath: string, referencePath: string): string[] {
    return [
        '--standalone',
        `--from=${PANDOC_INPUT_FORMAT}`,
        `--reference-doc=${referencePath}`,
        '--to=docx',
        '-o',
        outputPath,
        inputPath,
    ];
}

async function hasContent(filePath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(filePath);
        return stat.size > 0;
    } catch {
        // missing output
        return false;
    }
}

/** False when pandoc is absent, fails, or writes nothing. */
export async function convertWithPandoc(
    inputPath: string,
    outputPath: string,
    sheet: StyleSheet,
    headerText?: string,
): Promise<boolean> {
    const pandoc = await findExecutable('pandoc');
    if (!pandoc) {
        logToStderr('debug', 'pandoc not found on PATH');
        return false;
    }

    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'md2docx-'));
    try {
        const referencePath = path.join(tempDir, 'reference.docx');
        await writeReferenceDocx(referencePath, sheet, headerText);
        await fs.mkdir(path.dirname(outputPath), { recursive: true });
        await execFileAsync(pandoc, pandocArgs(inputPath, outputPath, referencePath));
        return await hasContent(outputPath);
    } catch (error) {
        logToStderr('warning', `[pandoc] failed: ${error instanceof Error ? error.message : String(error)}`);
        return false;
    } finally {
        await fs.rm(tempDir, { recursive: true, force: true });
    }
}
