/**
 * Conversion-level errors raised by the orchestrator and reported by the CLI.
 */

import { DocxError } from './docx/errors.js';

export enum ConversionErrorCode {
    INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
    UNSUPPORTED_OUTPUT = 'UNSUPPORTED_OUTPUT',
    PANDOC_FAILED = 'PANDOC_FAILED',
    BUILTIN_FAILED = 'BUILTIN_FAILED',
    DOC_EXPORT_FAILED = 'DOC_EXPORT_FAILED',
}

export class ConversionError extends Error {
    constructor(
        message: string,
        public readonly code: ConversionErrorCode,
        public readonly context: Record<string, unknown> = {},
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'ConversionError';
    }
}

/** Process exit code the CLI reports for each failure kind. */
export function exitCodeFor(error: unknown): number {
    if (!(error instanceof ConversionError)) return 1;
    switch (error.code) {
        case ConversionErrorCode.INPUT_NOT_FOUND:
        case ConversionErrorCode.UNSUPPORTED_OUTPUT:
            return 2;
        case ConversionErrorCode.DOC_EXPORT_FAILED:
            return 3;
        default:
            return 1;
    }
}

function formatContext(context: Record<string, unknown>): string {
    const entries = Object.entries(context).filter(
        (entry): entry is [string, string | number] => typeof entry[1] === 'string' || typeof entry[1] === 'number',
    );
    return entries.length > 0 ? ` (${entries.map(([key, value]) => `${key}=${value}`).join(', ')})` : '';
}

/** Stderr report: the error with its code, then the docx failure underneath it, if any. */
export function describeError(error: unknown): string {
    if (!(error instanceof Error)) return String(error);
    const lines = [
        error instanceof ConversionError || error instanceof DocxError
            ? `[${error.code}] ${error.message}`
            : error.message,
    ];
    const cause = error.cause;
    if (cause instanceof DocxError) {
        lines.push(`  caused by [${cause.code}] ${cause.message}${formatContext(cause.context)}`);
    } else if (cause instanceof Error) {
        lines.push(`  caused by ${cause.message}`);
    }
    return lines.join('\n');
}
