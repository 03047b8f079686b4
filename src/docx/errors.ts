/**
 * Errors raised while turning the document model into a .docx file.
 *
 * @module docx/errors
 */

export enum DocxErrorCode {
    DOCX_CREATE_FAILED = 'DOCX_CREATE_FAILED',
    DOCX_WRITE_FAILED = 'DOCX_WRITE_FAILED',
}

export class DocxError extends Error {
    constructor(
        message: string,
        public readonly code: DocxErrorCode,
        public readonly context: Record<string, unknown> = {},
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'DocxError';
    }
}

/** Run `operation`; anything it throws that is not already a DocxError becomes one, with the original as `cause`. */
export async function withDocxError<T>(
    code: DocxErrorCode,
    context: Record<string, unknown>,
    operation: () => Promise<T>,
): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        if (error instanceof DocxError) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw new DocxError(message, code, context, { cause: error });
    }
}
