/**
 * Forward-only cursor over a token array.
 *
 * The builder moves through the stream only via these methods, so every
 * "skip the inline and the close" step is spelled out by kind instead of
 * by a literal offset.
 */

import type { MarkdownToken, MarkdownTokenKind } from '../types.js';

export type TokenMatcher = (token: MarkdownToken) => boolean;

export function isKind<K extends MarkdownTokenKind>(kind: K) {
    return (token: MarkdownToken): token is Extract<MarkdownToken, { kind: K }> => token.kind === kind;
}

export class TokenCursor {
    private index = 0;

    constructor(private readonly tokens: readonly MarkdownToken[]) {}

    get position(): number {
        return this.index;
    }

    get done(): boolean {
        return this.index >= this.tokens.length;
    }

    /** Token `offset` places ahead of the current one, if any. */
    peek(offset = 0): MarkdownToken | undefined {
        return this.tokens[this.index + offset];
    }

    /** Return the current token and step past it. */
    next(): MarkdownToken | undefined {
        const token = this.tokens[this.index];
        if (token !== undefined) this.index++;
        return token;
    }

    advance(count = 1): void {
        this.index = Math.min(this.index + count, this.tokens.length);
    }

    /** Consume the current token when it matches. */
    consumeIf<T extends MarkdownToken>(matcher: (token: MarkdownToken) => token is T): T | undefined;
    consumeIf(matcher: TokenMatcher): MarkdownToken | undefined;
    consumeIf(matcher: TokenMatcher): MarkdownToken | undefined {
        const token = this.peek();
        if (token !== undefined && matcher(token)) {
            this.index++;
            return token;
        }
        return undefined;
    }

    /**
     * Step forward until the current token matches `stop`, handing each
     * skipped token to `visit`. The stop token is left unconsumed; returns
     * it, or undefined at end of stream.
     */
    scanUntil(stop: TokenMatcher, visit?: (token: MarkdownToken) => void): MarkdownToken | undefined {
        while (!this.done) {
            const token = this.tokens[this.index];
            if (stop(token)) return token;
            visit?.(token);
            this.index++;
        }
        return undefined;
    }

    /**
     * With the cursor on an `open` token, move past its balanced `close`,
     * visiting the tokens in between.
     */
    skipPastMatching(open: TokenMatcher, close: TokenMatcher, visit?: (token: MarkdownToken) => void): void {
        let depth = 0;
        while (!this.done) {
            const token = this.tokens[this.index++];
            if (open(token)) {
                depth++;
                if (depth === 1) continue;
            } else if (close(token)) {
                depth--;
                if (depth === 0) return;
            }
            visit?.(token);
        }
    }
}
