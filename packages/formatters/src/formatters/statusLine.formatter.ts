import type { Reading, ReferenceStore } from "@hexcast/core";
import type { ReadingFormatter } from "../types/response";

/**
 * Single upper-case line for shell prompts and message-of-the-day banners.
 */
export class StatusLineFormatter implements ReadingFormatter {
    readonly format = "status-line";

    constructor(private readonly store: ReferenceStore) {}

    render(reading: Reading): string {
        const primary = this.store.resolveIdentifier(reading.identifier);
        const name = primary.name.toUpperCase();

        const transformed = reading.transformed();
        if (!transformed) {
            return `${primary.unicode} ${primary.number} ${name}`;
        }

        const target = this.store.resolveIdentifier(transformed.identifier);
        return `${primary.unicode}→${target.unicode} ${primary.number} ${name} CHANGING INTO ${target.number} ${target.name.toUpperCase()}`;
    }
}
