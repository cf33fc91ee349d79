import {
    hexcastLogger,
    type OutputFormat,
    type ReferenceStore,
} from "@hexcast/core";
import { BriefFormatter } from "./formatters/brief.formatter";
import { CodesFormatter } from "./formatters/codes.formatter";
import { FullFormatter } from "./formatters/full.formatter";
import { StatusLineFormatter } from "./formatters/statusLine.formatter";
import { StructuredFormatter } from "./formatters/structured.formatter";
import type { ReadingFormatter } from "./types/response";

export * from "./types/response";
export { BriefFormatter } from "./formatters/brief.formatter";
export { CodesFormatter } from "./formatters/codes.formatter";
export { FullFormatter } from "./formatters/full.formatter";
export { StatusLineFormatter } from "./formatters/statusLine.formatter";
export {
    StructuredFormatter,
    buildStructuredReading,
} from "./formatters/structured.formatter";

export function createFormatter(
    format: OutputFormat,
    store: ReferenceStore,
): ReadingFormatter {
    hexcastLogger.debug({ format }, "Creating formatter");
    switch (format) {
        case "brief":
            return new BriefFormatter(store);
        case "full":
            return new FullFormatter(store);
        case "structured":
            return new StructuredFormatter(store);
        case "codes":
            return new CodesFormatter();
        case "status-line":
            return new StatusLineFormatter(store);
    }
}
