import { strict as assert } from "node:assert";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, test } from "node:test";
import { ReferenceLoadError } from "@hexcast/core";
import { z } from "zod";
import {
    DEFAULT_DATA_DIR,
    HEXAGRAMS_FILE,
    ReferenceLoader,
    TRIGRAMS_FILE,
} from "../index";

async function readShipped(file: string): Promise<Record<string, unknown>> {
    return z
        .record(z.string(), z.unknown())
        .parse(JSON.parse(await readFile(join(DEFAULT_DATA_DIR, file), "utf8")));
}

function asRecord(value: unknown): Record<string, unknown> {
    return z.record(z.string(), z.unknown()).parse(value);
}

describe("ReferenceLoader", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "hexcast-ref-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test("loads the shipped datasets", async () => {
        const { hexagrams, trigrams } = await new ReferenceLoader().load();

        assert.equal(Object.keys(hexagrams).length, 64);
        assert.equal(Object.keys(trigrams).length, 8);
        assert.equal(hexagrams["1"].unicode, "䷀");
        assert.equal(hexagrams["64"].unicode, "䷿");
        assert.equal(trigrams.Thunder.lines, "100");
    });

    test("fails naming the missing file", async () => {
        const path = join(dir, HEXAGRAMS_FILE);

        await assert.rejects(new ReferenceLoader(dir).loadHexagrams(), {
            name: "ReferenceLoadError",
            code: "REFERENCE_LOAD_FAILURE",
            path,
            message: `Reference file not found: ${path}`,
        });
    });

    test("rejects malformed JSON", async () => {
        const path = join(dir, TRIGRAMS_FILE);
        await writeFile(path, "{ not json", "utf8");

        await assert.rejects(new ReferenceLoader(dir).loadTrigrams(), (error) => {
            assert.ok(error instanceof ReferenceLoadError);
            assert.equal(error.path, path);
            assert.ok(error.message.startsWith(`Invalid JSON in ${path}: `));
            assert.ok(error.cause instanceof SyntaxError);
            return true;
        });
    });

    test("rejects a dataset with a record missing", async () => {
        const path = join(dir, HEXAGRAMS_FILE);
        const hexagrams = await readShipped(HEXAGRAMS_FILE);
        delete hexagrams["17"];
        await writeFile(path, JSON.stringify(hexagrams));

        await assert.rejects(new ReferenceLoader(dir).loadHexagrams(), {
            message: `Invalid reference data in ${path}: missing record 17`,
        });
    });

    test("rejects a record filed under the wrong key", async () => {
        const path = join(dir, HEXAGRAMS_FILE);
        const hexagrams = await readShipped(HEXAGRAMS_FILE);
        hexagrams["3"] = hexagrams["4"];
        await writeFile(path, JSON.stringify(hexagrams));

        await assert.rejects(new ReferenceLoader(dir).loadHexagrams(), {
            message: `Invalid reference data in ${path}: 3.number: key 3 does not match number 4`,
        });
    });

    test("rejects a glyph shared by two records", async () => {
        const path = join(dir, HEXAGRAMS_FILE);
        const hexagrams = await readShipped(HEXAGRAMS_FILE);
        hexagrams["2"] = { ...asRecord(hexagrams["2"]), unicode: "䷀" };
        await writeFile(path, JSON.stringify(hexagrams));

        await assert.rejects(new ReferenceLoader(dir).loadHexagrams(), {
            message: `Invalid reference data in ${path}: 2.unicode: glyph ䷀ is already used by record 1`,
        });
    });

    test("rejects a glyph longer than one character", async () => {
        const path = join(dir, HEXAGRAMS_FILE);
        const hexagrams = await readShipped(HEXAGRAMS_FILE);
        hexagrams["5"] = { ...asRecord(hexagrams["5"]), unicode: "䷄䷄" };
        await writeFile(path, JSON.stringify(hexagrams));

        await assert.rejects(new ReferenceLoader(dir).loadHexagrams(), (error) => {
            assert.ok(error instanceof ReferenceLoadError);
            assert.match(error.message, /5\.unicode: must be a single character/);
            return true;
        });
    });

    test("rejects a trigram whose lines are not three bits", async () => {
        const path = join(dir, TRIGRAMS_FILE);
        const trigrams = await readShipped(TRIGRAMS_FILE);
        trigrams.Lake = {
            name: "Lake",
            chinese: "兌",
            unicode: "☱",
            element: "Metal",
            attribute: "Joyous",
            lines: "1102",
        };
        await writeFile(path, JSON.stringify(trigrams));

        await assert.rejects(new ReferenceLoader(dir).loadTrigrams(), (error) => {
            assert.ok(error instanceof ReferenceLoadError);
            assert.match(error.message, /Lake\.lines: must be three 0\/1 characters/);
            return true;
        });
    });
});
