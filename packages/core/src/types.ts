/**
 * Whether a line is stable (young) or about to change (old).
 */
export enum Age {
    Young = "young",
    Old = "old",
}

/**
 * The two opposing line states: solid (yang) and broken (yin).
 */
export enum Polarity {
    Yang = "yang",
    Yin = "yin",
}

/**
 * Traditional numeric code of a line:
 * 6 = old yin, 7 = young yang, 8 = young yin, 9 = old yang.
 */
export type LineCode = 6 | 7 | 8 | 9;

export interface Line {
    readonly age: Age;
    readonly polarity: Polarity;
}

/** Six lines, index 0 at the bottom. */
export type FigureLines = readonly [Line, Line, Line, Line, Line, Line];

/** Six raw line codes as supplied by a caller, bottom to top. */
export type LineCodes = readonly [number, number, number, number, number, number];

/** Three polarities, bottom to top. */
export type SubfigurePolarities = readonly [Polarity, Polarity, Polarity];

export interface TextWithCommentary {
    text: string;
    commentary: string;
}

/**
 * Descriptive record for one of the 64 identifiers.
 */
export interface FigureRecord {
    number: number;
    name: string;
    chinese: string;
    pinyin: string;
    unicode: string;
    description: string;
    judgment: TextWithCommentary;
    image: TextWithCommentary;
    /** Keyed by line position "1".."6". */
    lines: Record<string, TextWithCommentary>;
}

export interface SubfigureRecord {
    name: string;
    chinese: string;
    unicode: string;
    element: string;
    attribute: string;
    /** Three "1"/"0" characters, bottom to top. */
    lines: string;
}

/**
 * Read access to the reference dataset.
 */
export interface ReferenceStore {
    /** Throws DataLookupError when no record exists. */
    resolveIdentifier(id: number): FigureRecord;
    resolveGlyph(glyph: string): number | undefined;
    /** Throws DataLookupError when no trigram has that name. */
    resolveSubfigure(name: string): SubfigureRecord;
    findSubfigure(polarities: SubfigurePolarities): SubfigureRecord;
    lineInterpretation(
        id: number,
        position: number,
    ): TextWithCommentary | undefined;
}

export type GlyphResolver = Pick<ReferenceStore, "resolveGlyph">;

export const OUTPUT_FORMATS = [
    "brief",
    "full",
    "structured",
    "codes",
    "status-line",
] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
