import { InvalidLineCodeError, OutOfRangeError } from "./errors";
import {
    createLine,
    isChanging,
    isLineCode,
    lineFromCode,
    lineToCode,
    polarityBit,
    polarityFromBit,
    transformLine,
} from "./line";
import {
    Age,
    type FigureLines,
    type Line,
    type LineCode,
    type LineCodes,
    Polarity,
    type SubfigurePolarities,
} from "./types";

export const MIN_IDENTIFIER = 1;
export const MAX_IDENTIFIER = 64;
export const LINE_COUNT = 6;

export type SixTuple<T> = readonly [T, T, T, T, T, T];

function mapSix<T, U>(
    items: SixTuple<T>,
    fn: (item: T, index: number) => U,
): SixTuple<U> {
    return [
        fn(items[0], 0),
        fn(items[1], 1),
        fn(items[2], 2),
        fn(items[3], 3),
        fn(items[4], 4),
        fn(items[5], 5),
    ];
}

const POSITIONS = [0, 1, 2, 3, 4, 5] as const;

export function isIdentifier(value: number): boolean {
    return (
        Number.isInteger(value) &&
        value >= MIN_IDENTIFIER &&
        value <= MAX_IDENTIFIER
    );
}

export function isSixTuple<T>(items: readonly T[]): items is SixTuple<T> {
    return items.length === LINE_COUNT;
}

/**
 * Polarity of bit `index` (0 = bottom line) in the identifier's binary form.
 */
export function identifierPolarity(id: number, index: number): Polarity {
    return polarityFromBit((id - 1) >> index);
}

/**
 * Bottom-to-top "1"/"0" key of three polarities, e.g. "100" for thunder.
 */
export function subfigureKey(polarities: SubfigurePolarities): string {
    return polarities.map((polarity) => String(polarityBit(polarity))).join("");
}

/**
 * Six stacked lines. Index 0 is the bottom line (line 1).
 *
 * The identifier reads yang as 1 and yin as 0, bottom line least
 * significant, plus one. This is a binary ordering, not the King Wen
 * sequence.
 */
export class Figure {
    readonly lines: FigureLines;

    private constructor(lines: FigureLines) {
        this.lines = lines;
    }

    static fromLines(lines: FigureLines): Figure {
        return new Figure(lines);
    }

    /**
     * Builds a figure from six codes (6, 7, 8, 9), bottom to top. Fails on
     * the first invalid code without building anything.
     */
    static fromCodes(codes: LineCodes): Figure {
        for (const code of codes) {
            if (!isLineCode(code)) {
                throw new InvalidLineCodeError(code);
            }
        }
        return new Figure(mapSix(codes, (code) => lineFromCode(code)));
    }

    /**
     * All lines young, polarities taken from the bits of (id - 1).
     */
    static fromIdentifier(id: number): Figure {
        if (!isIdentifier(id)) {
            throw new OutOfRangeError(id);
        }
        return new Figure(
            mapSix(POSITIONS, (index) =>
                createLine(Age.Young, identifierPolarity(id, index)),
            ),
        );
    }

    get identifier(): number {
        return (
            this.lines.reduce(
                (acc, line, index) => acc | (polarityBit(line.polarity) << index),
                0,
            ) + 1
        );
    }

    /** Polarities of lines 4, 5 and 6. */
    upperSubfigure(): SubfigurePolarities {
        return [
            this.lines[3].polarity,
            this.lines[4].polarity,
            this.lines[5].polarity,
        ];
    }

    /** Polarities of lines 1, 2 and 3. */
    lowerSubfigure(): SubfigurePolarities {
        return [
            this.lines[0].polarity,
            this.lines[1].polarity,
            this.lines[2].polarity,
        ];
    }

    hasChangingLines(): boolean {
        return this.lines.some(isChanging);
    }

    /** 1-indexed positions of old lines, ascending. */
    changingPositions(): number[] {
        const positions: number[] = [];
        this.lines.forEach((line, index) => {
            if (isChanging(line)) positions.push(index + 1);
        });
        return positions;
    }

    /**
     * Applies the line transform to every line. Without changing lines the
     * result equals this figure; check hasChangingLines() first.
     */
    transform(): Figure {
        return new Figure(mapSix(this.lines, transformLine));
    }

    codes(): SixTuple<LineCode> {
        return mapSix(this.lines, lineToCode);
    }

    line(position: number): Line | undefined {
        return this.lines[position - 1];
    }

    equals(other: Figure): boolean {
        return this.lines.every(
            (line, index) =>
                line.age === other.lines[index].age &&
                line.polarity === other.lines[index].polarity,
        );
    }
}
