import type { Reading, ReferenceStore } from "@hexcast/core";
import type { ReadingFormatter } from "../types/response";

export class BriefFormatter implements ReadingFormatter {
    readonly format = "brief";

    constructor(private readonly store: ReferenceStore) {}

    render(reading: Reading): string {
        const primary = this.store.resolveIdentifier(reading.identifier);
        let text = reading.question ? `Q: ${reading.question}\n` : "";

        text += `${primary.unicode} ${primary.number} ${primary.name}`;

        const transformed = reading.transformed();
        if (transformed) {
            const target = this.store.resolveIdentifier(transformed.identifier);
            text += ` → ${target.unicode} ${target.number} ${target.name}`;
            text += ` (lines: [${reading.changingPositions().join(", ")}])`;
        }

        return text;
    }
}
