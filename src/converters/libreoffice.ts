/**
 * .docx → legacy .doc through a headless LibreOffice.
 */

import fs from 'fs/promises';
import path from 'path';
import { logToStderr } from '../utils/logger.js';
import { execFileAsync, findFirstExecutable } from './exec.js';

export function libreOfficeArgs(docxPath: string, outDir: string): string[] {
    return ['--headless', '--convert-to', 'doc', path.resolve(docxPath), '--outdir', outDir];
}

/** LibreOffice names its output after the input; this is that name. */
export function producedDocPath(docxPath: string, outDir: string): string {
    return path.join(outDir, `${path.basename(docxPath, path.extname(docxPath))}.doc`);
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

export async function convertDocxToDoc(docxPath: string, docPath: string): Promise<boolean> {
    const soffice = await findFirstExecutable(['soffice', 'libreoffice']);
    if (!soffice) {
        logToStderr('warning', 'LibreOffice (soffice) not found; cannot export .doc. The .docx was kept.');
        return false;
    }

    const target = path.resolve(docPath);
    const outDir = path.dirname(target);
    try {
        await fs.mkdir(outDir, { recursive: true });
        await execFileAsync(soffice, libreOfficeArgs(docxPath, outDir));
        const produced = producedDocPath(docxPath, outDir);
        if (produced !== target && await exists(produced)) {
            await fs.rename(produced, target);
        }
        return await exists(target);
    } catch (error) {
        logToStderr('warning', `LibreOffice conversion failed: ${error instanceof Error ? error.message : String(error)}`);
        return false;
    }
}
