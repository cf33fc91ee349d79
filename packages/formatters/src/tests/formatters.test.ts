import { strict as assert } from "node:assert";
import { describe, test } from "node:test";
import { DataLookupError, Figure, Reading } from "@hexcast/core";
import {
    BriefFormatter,
    CodesFormatter,
    buildStructuredReading,
    createFormatter,
    FullFormatter,
    StatusLineFormatter,
    StructuredFormatter,
} from "../index";
import { FakeStore } from "./fixtures";

const store = new FakeStore();

// 22 with lines 3 and 4 changing, leading to 26
const changing = new Reading(
    Figure.fromCodes([7, 8, 9, 6, 7, 8]),
    "What next?",
);
const settled = new Reading(Figure.fromIdentifier(22));

describe("CodesFormatter", () => {
    test("prints the traditional numbers bottom to top", () => {
        assert.equal(new CodesFormatter().render(changing), "[7, 8, 9, 6, 7, 8]");
        assert.equal(new CodesFormatter().render(settled), "[7, 8, 7, 8, 7, 8]");
    });
});

describe("BriefFormatter", () => {
    const formatter = new BriefFormatter(store);

    test("prints glyph, identifier and name", () => {
        assert.equal(formatter.render(settled), "䷕ 22 Grace");
    });

    test("adds the question and the transformation", () => {
        assert.equal(
            formatter.render(changing),
            "Q: What next?\n䷕ 22 Grace → ䷙ 26 Great Taming (lines: [3, 4])",
        );
    });

    test("fails when a record is missing", () => {
        const orphan = new Reading(Figure.fromIdentifier(5));
        assert.throws(() => formatter.render(orphan), DataLookupError);
    });
});

describe("StatusLineFormatter", () => {
    const formatter = new StatusLineFormatter(store);

    test("prints an upper-case single line", () => {
        assert.equal(formatter.render(settled), "䷕ 22 GRACE");
    });

    test("names both figures when lines change", () => {
        assert.equal(
            formatter.render(changing),
            "䷕→䷙ 22 GRACE CHANGING INTO 26 GREAT TAMING",
        );
    });
});

describe("FullFormatter", () => {
    const formatter = new FullFormatter(store);

    test("renders a settled figure", () => {
        assert.equal(
            formatter.render(settled),
            [
                "Hexagram 22",
                "6: ━━  ━━",
                "5: ━━━━━━",
                "4: ━━  ━━",
                "3: ━━━━━━",
                "2: ━━  ━━",
                "1: ━━━━━━",
                "",
                "Traditional numbers: [7, 8, 7, 8, 7, 8]",
                "Upper trigram: ☵ Water [Yin, Yang, Yin]",
                "Lower trigram: ☲ Fire [Yang, Yin, Yang]",
                "",
                "=== ䷕ Grace ===",
                "Chinese: 賁 (Bi)",
                "Description: Description of Grace.",
                "",
                "Judgment: Judgment 22.",
                "Commentary: Judgment commentary 22.",
                "",
                "Image: Image 22.",
                "Image Commentary: Image commentary 22.",
            ].join("\n"),
        );
    });

    test("renders the question, changing lines and the transformed figure", () => {
        assert.equal(
            formatter.render(changing),
            [
                "Question: What next?",
                "",
                "Hexagram 22",
                "6: ━━  ━━",
                "5: ━━━━━━",
                "4: ━━  ━━ ×",
                "3: ━━━━━━ ○",
                "2: ━━  ━━",
                "1: ━━━━━━",
                "",
                "Changing lines: [3, 4]",
                "Transforms to hexagram 26",
                "",
                "Traditional numbers: [7, 8, 9, 6, 7, 8]",
                "Upper trigram: ☵ Water [Yin, Yang, Yin]",
                "Lower trigram: ☲ Fire [Yang, Yin, Yang]",
                "",
                "=== ䷕ Grace ===",
                "Chinese: 賁 (Bi)",
                "Description: Description of Grace.",
                "",
                "Judgment: Judgment 22.",
                "Commentary: Judgment commentary 22.",
                "",
                "Image: Image 22.",
                "Image Commentary: Image commentary 22.",
                "",
                "=== Changing Lines ===",
                "",
                "Line 3: Line 3 of 22.",
                "Comments: Comment 3 of 22.",
                "",
                "Line 4: Line 4 of 22.",
                "Comments: Comment 4 of 22.",
                "",
                "=== Transforms to ䷙ Great Taming ===",
                "Chinese: 大畜 (Da Chu)",
                "Description: Description of Great Taming.",
                "Judgment: Judgment 26.",
            ].join("\n"),
        );
    });
});

describe("StructuredFormatter", () => {
    const formatter = new StructuredFormatter(store);

    test("serializes a changing reading", () => {
        const output = formatter.render(changing);

        assert.equal(output.startsWith('{\n  "question": "What next?",\n'), true);
        assert.deepEqual(JSON.parse(output), {
            question: "What next?",
            lines: [7, 8, 9, 6, 7, 8],
            primary_hexagram: {
                number: 22,
                name: "Grace",
                chinese: "賁",
                pinyin: "Bi",
                unicode: "䷕",
                description: "Description of Grace.",
                judgment: {
                    text: "Judgment 22.",
                    commentary: "Judgment commentary 22.",
                },
                image: {
                    text: "Image 22.",
                    commentary: "Image commentary 22.",
                },
            },
            changing_lines: [
                { position: 3, text: "Line 3 of 22.", comments: "Comment 3 of 22." },
                { position: 4, text: "Line 4 of 22.", comments: "Comment 4 of 22." },
            ],
            transformed_hexagram: {
                number: 26,
                name: "Great Taming",
                chinese: "大畜",
                pinyin: "Da Chu",
                unicode: "䷙",
                description: "Description of Great Taming.",
                judgment: {
                    text: "Judgment 26.",
                    commentary: "Judgment commentary 26.",
                },
                image: {
                    text: "Image 26.",
                    commentary: "Image commentary 26.",
                },
            },
            upper_trigram: ["Yin", "Yang", "Yin"],
            lower_trigram: ["Yang", "Yin", "Yang"],
        });
    });

    test("uses null for an absent question and transformation", () => {
        const parsed = buildStructuredReading(settled, store);

        assert.equal(parsed.question, null);
        assert.deepEqual(parsed.changing_lines, []);
        assert.equal(parsed.transformed_hexagram, null);
        assert.match(formatter.render(settled), /\n  "transformed_hexagram": null,\n/);
    });
});

describe("createFormatter", () => {
    test("builds a formatter for every output format", () => {
        const expected = [
            ["brief", BriefFormatter],
            ["full", FullFormatter],
            ["structured", StructuredFormatter],
            ["codes", CodesFormatter],
            ["status-line", StatusLineFormatter],
        ] as const;
        for (const [format, type] of expected) {
            const formatter = createFormatter(format, store);
            assert.ok(formatter instanceof type, format);
            assert.equal(formatter.format, format);
        }
    });
});
