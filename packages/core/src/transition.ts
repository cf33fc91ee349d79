import { TransitionReconciliationError } from "./errors";
import { Figure, identifierPolarity } from "./figure";
import { createLine } from "./line";
import { Age, type FigureLines, type Line } from "./types";

function reconcileLine(source: number, target: number, index: number): Line {
    const from = identifierPolarity(source, index);
    const to = identifierPolarity(target, index);
    return from === to ? createLine(Age.Young, from) : createLine(Age.Old, from);
}

/**
 * Builds the figure whose changing lines turn `source` into `target`:
 * lines whose bits differ are old with the source polarity, the rest young.
 * Both identifiers must already be validated.
 */
export function createTransitionFigure(source: number, target: number): Figure {
    const lines: FigureLines = [
        reconcileLine(source, target, 0),
        reconcileLine(source, target, 1),
        reconcileLine(source, target, 2),
        reconcileLine(source, target, 3),
        reconcileLine(source, target, 4),
        reconcileLine(source, target, 5),
    ];
    const figure = Figure.fromLines(lines);
    verifyTransition(figure, source, target);
    return figure;
}

export function verifyTransition(
    figure: Figure,
    source: number,
    target: number,
): void {
    if (figure.identifier !== source) {
        throw new TransitionReconciliationError(
            source,
            target,
            `built figure has identifier ${figure.identifier}, expected ${source}`,
        );
    }

    if (source === target) {
        if (figure.hasChangingLines()) {
            throw new TransitionReconciliationError(
                source,
                target,
                "identical source and target produced changing lines",
            );
        }
        return;
    }

    if (!figure.hasChangingLines()) {
        throw new TransitionReconciliationError(
            source,
            target,
            "figure should have changing lines but has none",
        );
    }

    const transformed = figure.transform().identifier;
    if (transformed !== target) {
        throw new TransitionReconciliationError(
            source,
            target,
            `transformed figure has identifier ${transformed}, expected ${target}`,
        );
    }
}
