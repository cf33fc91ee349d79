import {
    DataLookupError,
    subfigureKey,
    type FigureRecord,
    type ReferenceStore,
    type SubfigurePolarities,
    type SubfigureRecord,
    type TextWithCommentary,
} from "@hexcast/core";
import {
    ReferenceLoader,
    type ReferenceData,
} from "./referenceLoader";
import type { HexagramDataset, TrigramDataset } from "./schema";

/**
 * ReferenceStore over the validated JSON datasets.
 */
export class JsonReferenceStore implements ReferenceStore {
    private readonly hexagrams: HexagramDataset;
    private readonly trigrams: TrigramDataset;

    constructor(data: ReferenceData) {
        this.hexagrams = data.hexagrams;
        this.trigrams = data.trigrams;
    }

    resolveIdentifier(id: number): FigureRecord {
        const record = this.findRecord(id);
        if (!record) {
            throw new DataLookupError(id);
        }
        return record;
    }

    // Linear scan; the glyph is not indexed.
    resolveGlyph(glyph: string): number | undefined {
        return Object.values(this.hexagrams).find(
            (record) => record.unicode === glyph,
        )?.number;
    }

    resolveSubfigure(name: string): SubfigureRecord {
        const record = Object.hasOwn(this.trigrams, name)
            ? this.trigrams[name]
            : undefined;
        if (!record) {
            throw new DataLookupError(name);
        }
        return record;
    }

    findSubfigure(polarities: SubfigurePolarities): SubfigureRecord {
        const key = subfigureKey(polarities);
        const record = Object.values(this.trigrams).find(
            (trigram) => trigram.lines === key,
        );
        if (!record) {
            throw new DataLookupError(key);
        }
        return record;
    }

    lineInterpretation(
        id: number,
        position: number,
    ): TextWithCommentary | undefined {
        const lines: Record<string, TextWithCommentary> | undefined =
            this.findRecord(id)?.lines;
        const key = String(position);
        return lines && Object.hasOwn(lines, key) ? lines[key] : undefined;
    }

    private findRecord(id: number): FigureRecord | undefined {
        const key = String(id);
        return Object.hasOwn(this.hexagrams, key)
            ? this.hexagrams[key]
            : undefined;
    }
}

/**
 * Loads both reference files and wraps them in a store.
 */
export async function loadReferenceStore(
    dataDir?: string,
): Promise<JsonReferenceStore> {
    const data = await new ReferenceLoader(dataDir).load();
    return new JsonReferenceStore(data);
}
