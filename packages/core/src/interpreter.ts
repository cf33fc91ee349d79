import { Diviner } from "./divination";
import { UnrecognizedInputError } from "./errors";
import {
    Figure,
    isIdentifier,
    isSixTuple,
    MAX_IDENTIFIER,
    MIN_IDENTIFIER,
} from "./figure";
import { isLineCode } from "./line";
import { hexcastLogger } from "./logger";
import { isIntegerInRange, isSingleCharacter, parseInteger } from "./parsing";
import { Reading } from "./reading";
import { createTransitionFigure } from "./transition";
import type { GlyphResolver, LineCodes } from "./types";

export type Resolution =
    | { kind: "cast"; figure: Figure }
    | { kind: "transition"; figure: Figure; source: number; target: number }
    | { kind: "identifier"; figure: Figure; identifier: number }
    | { kind: "glyph"; figure: Figure; identifier: number; glyph: string }
    | { kind: "codes"; figure: Figure; codes: LineCodes };

export type ResolutionKind = Resolution["kind"];

/** Returns a resolution when the text fits its notation, otherwise undefined. */
type Attempt = (text: string) => Resolution | undefined;

export const TRANSITION_SEPARATORS = ["→", "->"] as const;

/**
 * Splits at the earliest occurrence of any transition separator.
 */
export function splitTransition(
    text: string,
): { source: string; target: string } | undefined {
    let match: { index: number; separator: string } | undefined;

    for (const separator of TRANSITION_SEPARATORS) {
        const index = text.indexOf(separator);
        if (index !== -1 && (match === undefined || index < match.index)) {
            match = { index, separator };
        }
    }

    if (!match) {
        return undefined;
    }

    return {
        source: text.slice(0, match.index).trim(),
        target: text.slice(match.index + match.separator.length).trim(),
    };
}

function parseIdentifier(text: string): number | undefined {
    const value = parseInteger(text);
    return isIntegerInRange(value, MIN_IDENTIFIER, MAX_IDENTIFIER)
        ? value
        : undefined;
}

/**
 * Resolves free-form input into a figure. Notations are tried in order,
 * first match wins:
 *
 * 1. transition  `32→34`, `32->34`, `䷟→䷡`
 * 2. identifier  `1` .. `64`
 * 3. glyph       `䷀`
 * 4. line codes  `7,8,9,6,7,8`
 *
 * Empty input casts a fresh figure.
 */
export class InputInterpreter {
    private readonly glyphs: GlyphResolver;
    private readonly diviner: Diviner;
    private readonly attempts: readonly Attempt[];

    constructor(glyphs: GlyphResolver, diviner: Diviner = new Diviner()) {
        this.glyphs = glyphs;
        this.diviner = diviner;
        this.attempts = [
            (text) => this.tryTransition(text),
            (text) => this.tryIdentifier(text),
            (text) => this.tryGlyph(text),
            (text) => this.tryLineCodes(text),
        ];
    }

    resolve(input?: string): Resolution {
        const text = input?.trim() ?? "";

        if (!text) {
            return { kind: "cast", figure: this.diviner.cast() };
        }

        for (const attempt of this.attempts) {
            const resolution = attempt(text);
            if (resolution) {
                hexcastLogger.debug(
                    {
                        input: text,
                        kind: resolution.kind,
                        identifier: resolution.figure.identifier,
                    },
                    "Resolved input",
                );
                return resolution;
            }
        }

        throw new UnrecognizedInputError(text);
    }

    interpret(input?: string): Figure {
        return this.resolve(input).figure;
    }

    interpretReading(input?: string, question?: string): Reading {
        return new Reading(this.interpret(input), question);
    }

    private glyphIdentifier(text: string): number | undefined {
        if (!isSingleCharacter(text)) {
            return undefined;
        }
        const id = this.glyphs.resolveGlyph(text);
        return id !== undefined && isIdentifier(id) ? id : undefined;
    }

    private tryTransition(text: string): Resolution | undefined {
        const parts = splitTransition(text);
        if (!parts) {
            return undefined;
        }

        let source = parseIdentifier(parts.source);
        let target = parseIdentifier(parts.target);

        if (source === undefined || target === undefined) {
            source = this.glyphIdentifier(parts.source);
            target = this.glyphIdentifier(parts.target);
        }

        if (source === undefined || target === undefined) {
            hexcastLogger.debug(
                { input: text },
                "Separator present but sides did not resolve, trying other notations",
            );
            return undefined;
        }

        return {
            kind: "transition",
            figure: createTransitionFigure(source, target),
            source,
            target,
        };
    }

    private tryIdentifier(text: string): Resolution | undefined {
        const identifier = parseIdentifier(text);
        if (identifier === undefined) {
            return undefined;
        }
        return {
            kind: "identifier",
            figure: Figure.fromIdentifier(identifier),
            identifier,
        };
    }

    private tryGlyph(text: string): Resolution | undefined {
        const identifier = this.glyphIdentifier(text);
        if (identifier === undefined) {
            return undefined;
        }
        return {
            kind: "glyph",
            figure: Figure.fromIdentifier(identifier),
            identifier,
            glyph: text,
        };
    }

    /**
     * Needs exactly six comma-separated codes, each one of 6..9. Anything
     * else falls through.
     */
    private tryLineCodes(text: string): Resolution | undefined {
        if (!text.includes(",")) {
            return undefined;
        }

        const values: number[] = [];
        for (const part of text.split(",")) {
            const value = parseInteger(part.trim());
            if (value === null || !isLineCode(value)) {
                return undefined;
            }
            values.push(value);
        }

        if (!isSixTuple(values)) {
            return undefined;
        }

        return {
            kind: "codes",
            figure: this.diviner.castFromCodes(values),
            codes: values,
        };
    }
}
