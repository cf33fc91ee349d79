import {
    lineSymbol,
    polarityLabel,
    type FigureRecord,
    type Reading,
    type ReferenceStore,
    type SubfigurePolarities,
} from "@hexcast/core";
import type { ReadingFormatter } from "../types/response";

/**
 * Multi-section report: the drawn lines, the sub-figures, the record's
 * texts, and for changing readings the line texts and the figure they
 * lead to. Sections are separated by a blank line.
 */
export class FullFormatter implements ReadingFormatter {
    readonly format = "full";

    constructor(private readonly store: ReferenceStore) {}

    render(reading: Reading): string {
        const record = this.store.resolveIdentifier(reading.identifier);
        const sections: string[][] = [];

        if (reading.question) {
            sections.push([`Question: ${reading.question}`]);
        }

        sections.push(this.formatFigureSection(reading));

        const transformed = reading.transformed();
        if (transformed) {
            sections.push([
                `Changing lines: [${reading.changingPositions().join(", ")}]`,
                `Transforms to hexagram ${transformed.identifier}`,
            ]);
        }

        sections.push([
            `Traditional numbers: [${reading.figure.codes().join(", ")}]`,
            this.formatSubfigure("Upper", reading.figure.upperSubfigure()),
            this.formatSubfigure("Lower", reading.figure.lowerSubfigure()),
        ]);

        sections.push(
            [
                `=== ${record.unicode} ${record.name} ===`,
                `Chinese: ${record.chinese} (${record.pinyin})`,
                `Description: ${record.description}`,
            ],
            [
                `Judgment: ${record.judgment.text}`,
                `Commentary: ${record.judgment.commentary}`,
            ],
            [
                `Image: ${record.image.text}`,
                `Image Commentary: ${record.image.commentary}`,
            ],
        );

        if (transformed) {
            sections.push(...this.formatChangingLines(reading));
            sections.push(
                this.formatTransformed(
                    this.store.resolveIdentifier(transformed.identifier),
                ),
            );
        }

        return sections.map((section) => section.join("\n")).join("\n\n");
    }

    // top line first
    private formatFigureSection(reading: Reading): string[] {
        const rows = [`Hexagram ${reading.identifier}`];
        for (let position = 6; position >= 1; position--) {
            const line = reading.figure.line(position);
            if (line) {
                rows.push(`${position}: ${lineSymbol(line)}`);
            }
        }
        return rows;
    }

    private formatSubfigure(
        label: "Upper" | "Lower",
        polarities: SubfigurePolarities,
    ): string {
        const subfigure = this.store.findSubfigure(polarities);
        const labels = polarities.map(polarityLabel).join(", ");
        return `${label} trigram: ${subfigure.unicode} ${subfigure.name} [${labels}]`;
    }

    private formatChangingLines(reading: Reading): string[][] {
        const sections: string[][] = [["=== Changing Lines ==="]];
        for (const position of reading.changingPositions()) {
            const interpretation = this.store.lineInterpretation(
                reading.identifier,
                position,
            );
            if (interpretation) {
                sections.push([
                    `Line ${position}: ${interpretation.text}`,
                    `Comments: ${interpretation.commentary}`,
                ]);
            }
        }
        return sections;
    }

    private formatTransformed(record: FigureRecord): string[] {
        return [
            `=== Transforms to ${record.unicode} ${record.name} ===`,
            `Chinese: ${record.chinese} (${record.pinyin})`,
            `Description: ${record.description}`,
            `Judgment: ${record.judgment.text}`,
        ];
    }
}
