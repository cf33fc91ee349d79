import pino, { type DestinationStream, type LoggerOptions } from "pino";
import pretty from "pino-pretty";
import type { LogLevel } from "./environment";
import { parseBooleanFromText } from "./parsing";
import { settings } from "./settings";

const customLevels = {
    log: 29,
    success: 27,
};

type CustomLevel = keyof typeof customLevels;

export interface LoggerSettings {
    level: LogLevel;
    json: boolean;
}

const knownLevels = new Set<string>([
    ...Object.keys(pino.levels.values),
    ...Object.keys(customLevels),
    "silent",
]);

let json = parseBooleanFromText(settings.LOG_JSON_FORMAT) ?? false;
let jsonStream: DestinationStream | undefined;
let prettyStream: DestinationStream | undefined;

// stdout belongs to the reading, so every log line goes to stderr.
const currentStream = (): DestinationStream => {
    if (json) {
        jsonStream ??= pino.destination({ dest: 2, sync: true });
        return jsonStream;
    }
    prettyStream ??= pretty({
        colorize: true,
        translateTime: "yyyy-mm-dd HH:MM:ss",
        ignore: "pid,hostname",
        destination: 2,
        sync: true,
    });
    return prettyStream;
};

// Forwards to whichever output configureLogger selected last.
const stream: DestinationStream = {
    write: (msg) => {
        currentStream().write(msg);
    },
};

const requestedLevel = settings.DEFAULT_LOG_LEVEL?.trim().toLowerCase();
const defaultLevel =
    requestedLevel && knownLevels.has(requestedLevel) ? requestedLevel : "warn";

const options: LoggerOptions<CustomLevel> = {
    level: defaultLevel,
    customLevels,
};

export const hexcastLogger = pino(options, stream);

export type HexcastLogger = typeof hexcastLogger;

/**
 * Applies validated settings. Until this runs, the level and output come
 * from the raw process environment.
 */
export function configureLogger(next: LoggerSettings): void {
    hexcastLogger.level = next.level;
    json = next.json;
}

export function getLoggerSettings(): { level: string; json: boolean } {
    return { level: hexcastLogger.level, json };
}

export default hexcastLogger;
