/**
 * Type definitions for the Markdown → DOCX renderer.
 * Single source of truth for every type used across the docx module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Style sheet
// ═══════════════════════════════════════════════════════════════════════

export type ParagraphAlignment = 'left' | 'center' | 'right' | 'justify';

export type HeadingStyleLevel = 1 | 2 | 3;

export interface PageGeometry {
    widthMm: number;
    heightMm: number;
}

export interface PageMargins {
    topMm: number;
    bottomMm: number;
    leftMm: number;
    rightMm: number;
}

export interface BodyStyle {
    /** Face used for CJK characters (w:eastAsia). */
    chineseFont: string;
    /** Face used for Latin letters and digits (w:ascii / w:hAnsi). */
    westernFont: string;
    sizePt: number;
    /** Exact line spacing, never "at least". */
    lineSpacingPt: number;
}

export interface HeadingStyle {
    font: string;
    sizePt: number;
    alignment: ParagraphAlignment;
    spaceBeforePt: number;
    spaceAfterPt: number;
}

export interface HeaderFooterStyle {
    font: string;
    sizePt: number;
    text?: string;
}

/** Fully resolved style sheet. Frozen once returned by `resolveStyleSheet`. */
export interface StyleSheet {
    readonly page: Readonly<PageGeometry>;
    readonly margins: Readonly<PageMargins>;
    readonly body: Readonly<BodyStyle>;
    readonly headings: Readonly<Record<HeadingStyleLevel, Readonly<HeadingStyle>>>;
    readonly headerFooter: Readonly<HeaderFooterStyle>;
}

/** What a config file may supply: any subset of any group. */
export interface PartialStyleConfig {
    page?: Partial<PageGeometry>;
    margins?: Partial<PageMargins>;
    body?: Partial<BodyStyle>;
    headings?: Partial<Record<HeadingStyleLevel, Partial<HeadingStyle>>>;
    headerFooter?: Partial<HeaderFooterStyle>;
}

// ═══════════════════════════════════════════════════════════════════════
// Token stream (produced by the Markdown parser adapter)
// ═══════════════════════════════════════════════════════════════════════

export type InlineSpan =
    | { kind: 'text'; content: string }
    | { kind: 'code-inline'; content: string }
    | { kind: 'softbreak' }
    | { kind: 'hardbreak' }
    | { kind: 'em-open' }
    | { kind: 'em-close' }
    | { kind: 'strong-open' }
    | { kind: 'strong-close' }
    | { kind: 'link-open'; href?: string }
    | { kind: 'link-close' }
    | { kind: 'other'; type: string; content: string };

export type ListKind = 'bullet' | 'ordered';

export type MarkdownToken =
    | { kind: 'heading-open'; level: number }
    | { kind: 'heading-close'; level: number }
    | { kind: 'paragraph-open' }
    | { kind: 'paragraph-close' }
    | { kind: 'inline'; content: string; children: InlineSpan[] }
    | { kind: 'bullet-list-open' }
    | { kind: 'bullet-list-close' }
    | { kind: 'ordered-list-open' }
    | { kind: 'ordered-list-close' }
    | { kind: 'list-item-open' }
    | { kind: 'list-item-close' }
    | { kind: 'fence'; content: string; info: string }
    | { kind: 'blockquote-open' }
    | { kind: 'blockquote-close' }
    | { kind: 'horizontal-rule' }
    | { kind: 'other'; type: string };

export type MarkdownTokenKind = MarkdownToken['kind'];

export interface ListContext {
    kind: ListKind;
    depth: number;
}

// ═══════════════════════════════════════════════════════════════════════
// Document model
// ═══════════════════════════════════════════════════════════════════════

export interface DocRun {
    text: string;
    /** Font override applied to every script slot (monospace code). */
    font?: string;
}

export interface ParagraphBlock {
    type: 'paragraph';
    runs: DocRun[];
    lineSpacingPt?: number;
}

export interface HeadingBlock {
    type: 'heading';
    /** 1–6; only 1–3 carry configured styles. */
    level: number;
    text: string;
}

export type DocBlock = ParagraphBlock | HeadingBlock;

export interface StyledRun {
    text: string;
    font?: string;
    sizePt?: number;
}

export interface HeaderFooterPart {
    paragraphs: StyledRun[][];
}

export interface SectionSettings {
    page: PageGeometry;
    margins: PageMargins;
}

export interface NormalStyle {
    chineseFont: string;
    westernFont: string;
    sizePt: number;
    /** Undefined means the template's automatic spacing. */
    lineSpacingPt?: number;
}

export interface NamedHeadingStyle {
    font?: string;
    sizePt?: number;
    alignment?: ParagraphAlignment;
    spaceBeforePt?: number;
    spaceAfterPt?: number;
}

export interface StyledDocument {
    section: SectionSettings;
    styles: {
        normal: NormalStyle;
        headings: Record<HeadingStyleLevel, NamedHeadingStyle>;
    };
    header: HeaderFooterPart;
    footer: HeaderFooterPart;
    blocks: DocBlock[];
}

// ═══════════════════════════════════════════════════════════════════════
// Conversion
// ═══════════════════════════════════════════════════════════════════════

export type ConversionEngine = 'auto' | 'builtin' | 'pandoc';

export interface ConvertOptions {
    input: string;
    output?: string;
    header?: string;
    config?: string;
    engine?: ConversionEngine;
}

export interface ConvertResult {
    outputPath: string;
    docxPath: string;
    engine: 'builtin' | 'pandoc';
    warnings: string[];
}
