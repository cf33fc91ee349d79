import { randomInt } from "node:crypto";
import { Figure } from "./figure";
import { isLineCode } from "./line";
import { hexcastLogger } from "./logger";
import { Reading } from "./reading";
import type { LineCode, LineCodes } from "./types";

/**
 * Source of fair, independent binary draws.
 */
export interface RandomSource {
    flip(): boolean;
}

export const cryptoRandomSource: RandomSource = {
    flip: () => randomInt(2) === 1,
};

const HEADS = 3;
const TAILS = 2;

/**
 * Casts figures with the three-coin method: each line is the sum of three
 * coins worth 3 (heads) or 2 (tails).
 *
 * 6 (2+2+2) old yin    1/8
 * 7 (2+2+3) young yang 3/8
 * 8 (2+3+3) young yin  3/8
 * 9 (3+3+3) old yang   1/8
 */
export class Diviner {
    private readonly random: RandomSource;

    constructor(random: RandomSource = cryptoRandomSource) {
        this.random = random;
    }

    castLineCode(): LineCode {
        let sum = 0;
        for (let coin = 0; coin < 3; coin++) {
            sum += this.random.flip() ? HEADS : TAILS;
        }
        if (!isLineCode(sum)) {
            // three coins of 2 or 3 always land in 6..9
            throw new Error(`Coin sum out of range: ${sum}`);
        }
        return sum;
    }

    /** Draws six lines, bottom to top. */
    cast(): Figure {
        const codes: LineCodes = [
            this.castLineCode(),
            this.castLineCode(),
            this.castLineCode(),
            this.castLineCode(),
            this.castLineCode(),
            this.castLineCode(),
        ];
        const figure = Figure.fromCodes(codes);
        hexcastLogger.debug(
            { codes, identifier: figure.identifier },
            "Cast figure",
        );
        return figure;
    }

    castReading(question?: string): Reading {
        return new Reading(this.cast(), question);
    }

    /**
     * Builds a figure from six supplied codes. Throws InvalidLineCodeError
     * for the first code outside 6..9.
     */
    castFromCodes(codes: LineCodes): Figure {
        return Figure.fromCodes(codes);
    }
}
