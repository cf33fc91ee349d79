import type { OutputFormat, Reading } from "@hexcast/core";

export interface ReadingFormatter {
    readonly format: OutputFormat;
    render(reading: Reading): string;
}

export interface StructuredHexagram {
    number: number;
    name: string;
    chinese: string;
    pinyin: string;
    unicode: string;
    description: string;
    judgment: { text: string; commentary: string };
    image: { text: string; commentary: string };
}

export interface StructuredLineInterpretation {
    position: number;
    text: string;
    comments: string;
}

/**
 * Shape of the `structured` output. Field names are part of the output
 * contract, hence snake_case.
 */
export interface StructuredReading {
    question: string | null;
    lines: number[];
    primary_hexagram: StructuredHexagram;
    changing_lines: StructuredLineInterpretation[];
    transformed_hexagram: StructuredHexagram | null;
    upper_trigram: string[];
    lower_trigram: string[];
}
