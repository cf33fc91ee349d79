import type { Figure } from "./figure";

/**
 * A figure plus the question it was cast for.
 */
export class Reading {
    readonly figure: Figure;
    readonly question?: string;

    constructor(figure: Figure, question?: string) {
        this.figure = figure;
        const trimmed = question?.trim();
        if (trimmed) {
            this.question = trimmed;
        }
    }

    get identifier(): number {
        return this.figure.identifier;
    }

    hasChangingLines(): boolean {
        return this.figure.hasChangingLines();
    }

    changingPositions(): number[] {
        return this.figure.changingPositions();
    }

    /** The figure the changing lines lead to, if there are any. */
    transformed(): Figure | undefined {
        return this.figure.hasChangingLines()
            ? this.figure.transform()
            : undefined;
    }
}
