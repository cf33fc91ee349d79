import {
    polarityLabel,
    type FigureRecord,
    type Reading,
    type ReferenceStore,
} from "@hexcast/core";
import type {
    ReadingFormatter,
    StructuredHexagram,
    StructuredLineInterpretation,
    StructuredReading,
} from "../types/response";

function toStructuredHexagram(record: FigureRecord): StructuredHexagram {
    return {
        number: record.number,
        name: record.name,
        chinese: record.chinese,
        pinyin: record.pinyin,
        unicode: record.unicode,
        description: record.description,
        judgment: {
            text: record.judgment.text,
            commentary: record.judgment.commentary,
        },
        image: {
            text: record.image.text,
            commentary: record.image.commentary,
        },
    };
}

export function buildStructuredReading(
    reading: Reading,
    store: ReferenceStore,
): StructuredReading {
    const { figure } = reading;
    const identifier = reading.identifier;

    // positions without a line text are left out
    const changingLines: StructuredLineInterpretation[] = [];
    for (const position of reading.changingPositions()) {
        const interpretation = store.lineInterpretation(identifier, position);
        if (interpretation) {
            changingLines.push({
                position,
                text: interpretation.text,
                comments: interpretation.commentary,
            });
        }
    }

    const transformed = reading.transformed();

    return {
        question: reading.question ?? null,
        lines: [...figure.codes()],
        primary_hexagram: toStructuredHexagram(
            store.resolveIdentifier(identifier),
        ),
        changing_lines: changingLines,
        transformed_hexagram: transformed
            ? toStructuredHexagram(
                  store.resolveIdentifier(transformed.identifier),
              )
            : null,
        upper_trigram: figure.upperSubfigure().map(polarityLabel),
        lower_trigram: figure.lowerSubfigure().map(polarityLabel),
    };
}

export class StructuredFormatter implements ReadingFormatter {
    readonly format = "structured";

    constructor(private readonly store: ReferenceStore) {}

    render(reading: Reading): string {
        return JSON.stringify(
            buildStructuredReading(reading, this.store),
            null,
            2,
        );
    }
}
