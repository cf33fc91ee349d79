import type { Reading } from "@hexcast/core";
import type { ReadingFormatter } from "../types/response";

/** `[7, 8, 9, 6, 7, 8]`, bottom line first. */
export class CodesFormatter implements ReadingFormatter {
    readonly format = "codes";

    render(reading: Reading): string {
        return `[${reading.figure.codes().join(", ")}]`;
    }
}
