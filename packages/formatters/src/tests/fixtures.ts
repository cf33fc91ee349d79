import {
    DataLookupError,
    subfigureKey,
    type FigureRecord,
    type ReferenceStore,
    type SubfigurePolarities,
    type SubfigureRecord,
    type TextWithCommentary,
} from "@hexcast/core";

function makeRecord(
    number: number,
    name: string,
    unicode: string,
    chinese: string,
    pinyin: string,
): FigureRecord {
    const lines: Record<string, TextWithCommentary> = {};
    for (let position = 1; position <= 6; position++) {
        lines[String(position)] = {
            text: `Line ${position} of ${number}.`,
            commentary: `Comment ${position} of ${number}.`,
        };
    }
    return {
        number,
        name,
        chinese,
        pinyin,
        unicode,
        description: `Description of ${name}.`,
        judgment: {
            text: `Judgment ${number}.`,
            commentary: `Judgment commentary ${number}.`,
        },
        image: {
            text: `Image ${number}.`,
            commentary: `Image commentary ${number}.`,
        },
        lines,
    };
}

function makeSubfigure(
    name: string,
    unicode: string,
    lines: string,
): SubfigureRecord {
    return { name, chinese: "", unicode, element: "", attribute: "", lines };
}

/**
 * In-memory store holding a handful of records and all eight sub-figures.
 */
export class FakeStore implements ReferenceStore {
    readonly records = new Map<number, FigureRecord>([
        [1, makeRecord(1, "The Creative", "䷀", "乾", "Qian")],
        [22, makeRecord(22, "Grace", "䷕", "賁", "Bi")],
        [26, makeRecord(26, "Great Taming", "䷙", "大畜", "Da Chu")],
    ]);

    readonly subfigures: SubfigureRecord[] = [
        makeSubfigure("Heaven", "☰", "111"),
        makeSubfigure("Lake", "☱", "110"),
        makeSubfigure("Fire", "☲", "101"),
        makeSubfigure("Thunder", "☳", "100"),
        makeSubfigure("Wind", "☴", "011"),
        makeSubfigure("Water", "☵", "010"),
        makeSubfigure("Mountain", "☶", "001"),
        makeSubfigure("Earth", "☷", "000"),
    ];

    resolveIdentifier(id: number): FigureRecord {
        const record = this.records.get(id);
        if (!record) {
            throw new DataLookupError(id);
        }
        return record;
    }

    resolveGlyph(glyph: string): number | undefined {
        return [...this.records.values()].find(
            (record) => record.unicode === glyph,
        )?.number;
    }

    resolveSubfigure(name: string): SubfigureRecord {
        const record = this.subfigures.find((item) => item.name === name);
        if (!record) {
            throw new DataLookupError(name);
        }
        return record;
    }

    findSubfigure(polarities: SubfigurePolarities): SubfigureRecord {
        const key = subfigureKey(polarities);
        const record = this.subfigures.find((item) => item.lines === key);
        if (!record) {
            throw new DataLookupError(key);
        }
        return record;
    }

    lineInterpretation(
        id: number,
        position: number,
    ): TextWithCommentary | undefined {
        return this.records.get(id)?.lines[String(position)];
    }
}
