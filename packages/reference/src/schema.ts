import { isSingleCharacter } from "@hexcast/core";
import { z } from "zod";

export const textWithCommentarySchema = z.object({
    text: z.string(),
    commentary: z.string(),
});

export const figureRecordSchema = z.object({
    number: z.number().int().min(1).max(64),
    name: z.string().min(1),
    chinese: z.string().min(1),
    pinyin: z.string(),
    unicode: z.string().refine(isSingleCharacter, "must be a single character"),
    description: z.string(),
    judgment: textWithCommentarySchema,
    image: textWithCommentarySchema,
    lines: z.object({
        "1": textWithCommentarySchema,
        "2": textWithCommentarySchema,
        "3": textWithCommentarySchema,
        "4": textWithCommentarySchema,
        "5": textWithCommentarySchema,
        "6": textWithCommentarySchema,
    }),
});

export const subfigureRecordSchema = z.object({
    name: z.string().min(1),
    chinese: z.string(),
    unicode: z.string(),
    element: z.string(),
    attribute: z.string(),
    lines: z.string().regex(/^[01]{3}$/, "must be three 0/1 characters"),
});

/**
 * hexagrams.json: records keyed "1".."64", each key matching its number,
 * each with its own glyph.
 */
export const hexagramDatasetSchema = z
    .record(z.string(), figureRecordSchema)
    .superRefine((records, ctx) => {
        for (let n = 1; n <= 64; n++) {
            if (!(String(n) in records)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `missing record ${n}`,
                });
            }
        }
        for (const [key, record] of Object.entries(records)) {
            if (key !== String(record.number)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [key, "number"],
                    message: `key ${key} does not match number ${record.number}`,
                });
            }
        }

        const glyphOwners = new Map<string, string>();
        for (const [key, record] of Object.entries(records)) {
            const owner = glyphOwners.get(record.unicode);
            if (owner !== undefined) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [key, "unicode"],
                    message: `glyph ${record.unicode} is already used by record ${owner}`,
                });
            } else {
                glyphOwners.set(record.unicode, key);
            }
        }
    });

/**
 * trigrams.json: eight records, one per three-bit pattern.
 */
export const trigramDatasetSchema = z
    .record(z.string(), subfigureRecordSchema)
    .superRefine((records, ctx) => {
        const patterns = new Set(
            Object.values(records).map((record) => record.lines),
        );
        if (Object.keys(records).length !== 8 || patterns.size !== 8) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "expected 8 trigrams with distinct line patterns",
            });
        }
    });

export type HexagramDataset = z.infer<typeof hexagramDatasetSchema>;
export type TrigramDataset = z.infer<typeof trigramDatasetSchema>;
