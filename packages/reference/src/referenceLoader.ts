import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { hexcastLogger, ReferenceLoadError } from "@hexcast/core";
import type { ZodType, ZodTypeDef } from "zod";
import {
    hexagramDatasetSchema,
    trigramDatasetSchema,
    type HexagramDataset,
    type TrigramDataset,
} from "./schema";

export const HEXAGRAMS_FILE = "hexagrams.json";
export const TRIGRAMS_FILE = "trigrams.json";

/** The data/ directory shipped beside this package's sources. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));

export interface ReferenceData {
    hexagrams: HexagramDataset;
    trigrams: TrigramDataset;
}

/**
 * Handles loading and validation of the JSON reference files
 */
export class ReferenceLoader {
    private readonly referencesRoot: string;

    constructor(referencesRoot: string = DEFAULT_DATA_DIR) {
        this.referencesRoot = referencesRoot;
        hexcastLogger.debug(
            { root: referencesRoot },
            "[ReferenceLoader] Initialized",
        );
    }

    async load(): Promise<ReferenceData> {
        const [hexagrams, trigrams] = await Promise.all([
            this.loadHexagrams(),
            this.loadTrigrams(),
        ]);
        return { hexagrams, trigrams };
    }

    loadHexagrams(): Promise<HexagramDataset> {
        return this.loadJSONReference(HEXAGRAMS_FILE, hexagramDatasetSchema);
    }

    loadTrigrams(): Promise<TrigramDataset> {
        return this.loadJSONReference(TRIGRAMS_FILE, trigramDatasetSchema);
    }

    /**
     * Reads, parses and validates one file under the reference root.
     */
    private async loadJSONReference<T>(
        file: string,
        schema: ZodType<T, ZodTypeDef, unknown>,
    ): Promise<T> {
        const fullPath = join(this.referencesRoot, file);

        hexcastLogger.debug({ path: fullPath }, "[ReferenceLoader] Loading");

        if (!existsSync(fullPath)) {
            throw new ReferenceLoadError(
                fullPath,
                `Reference file not found: ${fullPath}`,
            );
        }

        let content: unknown;
        try {
            content = JSON.parse(await readFile(fullPath, "utf8"));
        } catch (error) {
            const detail =
                error instanceof Error ? error.message : String(error);
            throw new ReferenceLoadError(
                fullPath,
                error instanceof SyntaxError
                    ? `Invalid JSON in ${fullPath}: ${detail}`
                    : `Failed to read ${fullPath}: ${detail}`,
                error,
            );
        }

        const result = schema.safeParse(content);
        if (!result.success) {
            const issues = result.error.issues.map((issue) =>
                issue.path.length > 0
                    ? `${issue.path.join(".")}: ${issue.message}`
                    : issue.message,
            );
            throw new ReferenceLoadError(
                fullPath,
                `Invalid reference data in ${fullPath}: ${issues.join("; ")}`,
                result.error,
            );
        }

        hexcastLogger.success(
            { path: fullPath },
            `[ReferenceLoader] Loaded ${file}`,
        );
        return result.data;
    }
}
