import { InvalidLineCodeError } from "./errors";
import { Age, type Line, type LineCode, Polarity } from "./types";

const OLD_YIN: Line = Object.freeze({ age: Age.Old, polarity: Polarity.Yin });
const YOUNG_YANG: Line = Object.freeze({
    age: Age.Young,
    polarity: Polarity.Yang,
});
const YOUNG_YIN: Line = Object.freeze({ age: Age.Young, polarity: Polarity.Yin });
const OLD_YANG: Line = Object.freeze({ age: Age.Old, polarity: Polarity.Yang });

function assertNever(value: never): never {
    throw new Error(`Unhandled line state: ${String(value)}`);
}

export function createLine(age: Age, polarity: Polarity): Line {
    switch (age) {
        case Age.Old:
            return polarity === Polarity.Yang ? OLD_YANG : OLD_YIN;
        case Age.Young:
            return polarity === Polarity.Yang ? YOUNG_YANG : YOUNG_YIN;
        default:
            return assertNever(age);
    }
}

export function isLineCode(value: number): value is LineCode {
    return value === 6 || value === 7 || value === 8 || value === 9;
}

export function lineFromCode(code: number): Line {
    if (!isLineCode(code)) {
        throw new InvalidLineCodeError(code);
    }
    switch (code) {
        case 6:
            return OLD_YIN;
        case 7:
            return YOUNG_YANG;
        case 8:
            return YOUNG_YIN;
        case 9:
            return OLD_YANG;
        default:
            return assertNever(code);
    }
}

export function lineToCode(line: Line): LineCode {
    switch (line.age) {
        case Age.Old:
            return line.polarity === Polarity.Yang ? 9 : 6;
        case Age.Young:
            return line.polarity === Polarity.Yang ? 7 : 8;
        default:
            return assertNever(line.age);
    }
}

export function isChanging(line: Line): boolean {
    return line.age === Age.Old;
}

export function flipPolarity(polarity: Polarity): Polarity {
    switch (polarity) {
        case Polarity.Yang:
            return Polarity.Yin;
        case Polarity.Yin:
            return Polarity.Yang;
        default:
            return assertNever(polarity);
    }
}

/**
 * An old line flips polarity and becomes young; a young line is unchanged.
 */
export function transformLine(line: Line): Line {
    switch (line.age) {
        case Age.Old:
            return createLine(Age.Young, flipPolarity(line.polarity));
        case Age.Young:
            return line;
        default:
            return assertNever(line.age);
    }
}

export function polarityBit(polarity: Polarity): 0 | 1 {
    return polarity === Polarity.Yang ? 1 : 0;
}

export function polarityFromBit(bit: number): Polarity {
    return bit & 1 ? Polarity.Yang : Polarity.Yin;
}

export function polarityLabel(polarity: Polarity): "Yang" | "Yin" {
    switch (polarity) {
        case Polarity.Yang:
            return "Yang";
        case Polarity.Yin:
            return "Yin";
        default:
            return assertNever(polarity);
    }
}

export function lineSymbol(line: Line): string {
    switch (lineToCode(line)) {
        case 7:
            return "━━━━━━";
        case 8:
            return "━━  ━━";
        case 9:
            return "━━━━━━ ○";
        case 6:
            return "━━  ━━ ×";
    }
}
