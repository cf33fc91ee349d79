import {
    configureLogger,
    Diviner,
    hexcastLogger,
    InputInterpreter,
    outputFormatSchema,
    OUTPUT_FORMATS,
    UsageError,
    validateEnvironment,
    type OutputFormat,
} from "@hexcast/core";
import { createFormatter } from "@hexcast/formatters";
import { loadReferenceStore } from "@hexcast/reference";

export const VERSION = "0.1.0";

export interface CliArguments {
    input?: string;
    format?: OutputFormat;
    question?: string;
    showHelp: boolean;
    showVersion: boolean;
}

type ValueFlag = "input" | "format" | "question";

const VALUE_FLAGS: Record<string, ValueFlag> = {
    "--input": "input",
    "-i": "input",
    "--format": "format",
    "-f": "format",
    "--question": "question",
    "-q": "question",
};

function parseFormat(value: string): OutputFormat {
    const result = outputFormatSchema.safeParse(value);
    if (!result.success) {
        throw new UsageError(
            `Invalid format '${value}'. Expected one of: ${OUTPUT_FORMATS.join(", ")}`,
        );
    }
    return result.data;
}

/**
 * Accepts `--flag value` and `--flag=value`. Throws UsageError on unknown
 * flags, missing values and positional arguments.
 */
export function parseArguments(argv: readonly string[]): CliArguments {
    const args: CliArguments = { showHelp: false, showVersion: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        switch (arg) {
            case "--help":
            case "-h":
                args.showHelp = true;
                continue;
            case "--version":
            case "-v":
                args.showVersion = true;
                continue;
        }

        const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const key = Object.hasOwn(VALUE_FLAGS, flag)
            ? VALUE_FLAGS[flag]
            : undefined;

        if (!key) {
            throw new UsageError(
                arg.startsWith("-")
                    ? `Unknown option: ${flag}`
                    : `Unexpected argument: ${arg}`,
            );
        }

        let value: string | undefined;
        if (eq !== -1) {
            value = arg.slice(eq + 1);
        } else {
            i++;
            value = argv[i];
        }
        if (value === undefined) {
            throw new UsageError(`Missing value for ${flag}`);
        }

        if (key === "format") {
            args.format = parseFormat(value);
        } else {
            args[key] = value;
        }
    }

    return args;
}

export const HELP_TEXT = `hexcast v${VERSION} - cast and read six-line figures

Usage:
  hexcast [options]

Options:
  --input, -i <text>       Figure to read instead of casting one:
                             identifier      1..64
                             glyph           ䷀..䷿
                             transition      32→34, 32->34, ䷟→䷡
                             line codes      7,8,9,6,7,8 (bottom line first)
  --format, -f <name>      ${OUTPUT_FORMATS.join(" | ")} (default: $HEXCAST_FORMAT or full)
  --question, -q <text>    Question to record with the reading
  --help, -h               Show help
  --version, -v            Show version

Environment:
  HEXCAST_DATA_DIR         Directory holding hexagrams.json and trigrams.json
  HEXCAST_FORMAT           Default output format
  DEFAULT_LOG_LEVEL        Log level (default: warn); logs go to stderr
  LOG_JSON_FORMAT          Write logs as JSON lines`;

export interface CliOptions {
    stdout?: (text: string) => void;
    stderr?: (text: string) => void;
    env?: Record<string, string | undefined>;
    diviner?: Diviner;
}

/**
 * Runs one invocation and resolves to the process exit code: 0 on success,
 * 1 on a failed reading, 2 on bad arguments.
 */
export async function runCli(
    argv: readonly string[],
    options: CliOptions = {},
): Promise<number> {
    const stdout =
        options.stdout ?? ((text: string) => process.stdout.write(text));
    const stderr =
        options.stderr ?? ((text: string) => process.stderr.write(text));

    try {
        const args = parseArguments(argv);

        if (args.showHelp) {
            stdout(`${HELP_TEXT}\n`);
            return 0;
        }
        if (args.showVersion) {
            stdout(`hexcast v${VERSION}\n`);
            return 0;
        }

        const env = validateEnvironment(options.env ?? process.env);
        configureLogger({
            level: env.DEFAULT_LOG_LEVEL,
            json: env.LOG_JSON_FORMAT,
        });
        const store = await loadReferenceStore(env.HEXCAST_DATA_DIR);
        const interpreter = new InputInterpreter(store, options.diviner);
        const reading = interpreter.interpretReading(args.input, args.question);
        const formatter = createFormatter(
            args.format ?? env.HEXCAST_FORMAT,
            store,
        );

        hexcastLogger.info(
            {
                identifier: reading.identifier,
                changing: reading.changingPositions(),
                format: formatter.format,
            },
            "Reading ready",
        );

        stdout(`${formatter.render(reading)}\n`);
        return 0;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        hexcastLogger.error({ err: error }, "Reading failed");
        stderr(`Error: ${message}\n`);
        return error instanceof UsageError ? 2 : 1;
    }
}
