export type DivinationErrorCode =
    | "INVALID_LINE_CODE"
    | "OUT_OF_RANGE"
    | "UNRECOGNIZED_INPUT"
    | "DATA_LOOKUP_FAILURE"
    | "TRANSITION_INCONSISTENT"
    | "REFERENCE_LOAD_FAILURE"
    | "INVALID_CONFIGURATION"
    | "INVALID_USAGE";

export class DivinationError extends Error {
    readonly code: DivinationErrorCode;

    constructor(
        code: DivinationErrorCode,
        message: string,
        public readonly cause?: unknown,
    ) {
        super(message);
        this.name = "DivinationError";
        this.code = code;
    }
}

export class InvalidLineCodeError extends DivinationError {
    constructor(public readonly value: number) {
        super(
            "INVALID_LINE_CODE",
            `Invalid line code: ${value}. Must be 6, 7, 8, or 9`,
        );
        this.name = "InvalidLineCodeError";
    }
}

export class OutOfRangeError extends DivinationError {
    constructor(public readonly value: number) {
        super(
            "OUT_OF_RANGE",
            `Identifier ${value} is out of range. Must be an integer from 1 to 64`,
        );
        this.name = "OutOfRangeError";
    }
}

export class UnrecognizedInputError extends DivinationError {
    constructor(public readonly text: string) {
        super(
            "UNRECOGNIZED_INPUT",
            `Invalid input: '${text}'. Expected hexagram number (1-64), Unicode character (䷀-䷿), changing format (32→34 or ䷟→䷡), or comma-separated line numbers (6,7,8,9)`,
        );
        this.name = "UnrecognizedInputError";
    }
}

export class DataLookupError extends DivinationError {
    constructor(public readonly key: number | string) {
        super(
            "DATA_LOOKUP_FAILURE",
            typeof key === "number"
                ? `No reference record for hexagram ${key}`
                : `No reference record for trigram '${key}'`,
        );
        this.name = "DataLookupError";
    }
}

/**
 * Raised when a reconstructed transition figure does not reproduce its
 * source and target. Points at a defect in the bit arithmetic, never at
 * the user's input.
 */
export class TransitionReconciliationError extends DivinationError {
    constructor(
        public readonly source: number,
        public readonly target: number,
        detail: string,
    ) {
        super(
            "TRANSITION_INCONSISTENT",
            `Internal error reconciling ${source}→${target}: ${detail}`,
        );
        this.name = "TransitionReconciliationError";
    }
}

export class ReferenceLoadError extends DivinationError {
    constructor(
        public readonly path: string,
        message: string,
        cause?: unknown,
    ) {
        super("REFERENCE_LOAD_FAILURE", message, cause);
        this.name = "ReferenceLoadError";
    }
}

export class ConfigurationError extends DivinationError {
    constructor(
        message: string,
        public readonly issues: string[] = [],
        cause?: unknown,
    ) {
        super("INVALID_CONFIGURATION", message, cause);
        this.name = "ConfigurationError";
    }
}

/** Bad command-line arguments. */
export class UsageError extends DivinationError {
    constructor(message: string) {
        super("INVALID_USAGE", message);
        this.name = "UsageError";
    }
}
