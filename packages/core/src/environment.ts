import { z } from "zod";
import { ConfigurationError } from "./errors";
import { parseBooleanFromText } from "./parsing";
import { OUTPUT_FORMATS } from "./types";

export const LOG_LEVELS = [
    "fatal",
    "error",
    "warn",
    "info",
    "log",
    "success",
    "debug",
    "trace",
    "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// dotenv turns `KEY=` into an empty string; treat it as unset
const blankAsUndefined = (value: unknown) =>
    typeof value === "string" && value.trim() === "" ? undefined : value;

export const outputFormatSchema = z.enum(OUTPUT_FORMATS);

export const environmentSchema = z.object({
    HEXCAST_DATA_DIR: z.preprocess(blankAsUndefined, z.string().optional()),
    HEXCAST_FORMAT: z.preprocess(
        blankAsUndefined,
        outputFormatSchema.default("full"),
    ),
    DEFAULT_LOG_LEVEL: z.preprocess(
        (value) => {
            const blank = blankAsUndefined(value);
            return typeof blank === "string" ? blank.toLowerCase() : blank;
        },
        z.enum(LOG_LEVELS).default("warn"),
    ),
    LOG_JSON_FORMAT: z.preprocess(
        blankAsUndefined,
        z
            .string()
            .optional()
            .refine(
                (value) => value === undefined || parseBooleanFromText(value) !== null,
                "must be a yes/no style boolean",
            )
            .transform((value) => parseBooleanFromText(value) ?? false),
    ),
});

export type Environment = z.infer<typeof environmentSchema>;

export function validateEnvironment(
    env: Record<string, string | undefined>,
): Environment {
    const result = environmentSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
        );
        throw new ConfigurationError(
            `Invalid environment configuration: ${issues.join("; ")}`,
            issues,
            result.error,
        );
    }
    return result.data;
}
