/**
 * Parses a string to determine its boolean equivalent.
 *
 * Recognized affirmative values: "YES", "Y", "TRUE", "T", "1", "ON", "ENABLE".
 * Recognized negative values: "NO", "N", "FALSE", "F", "0", "OFF", "DISABLE".
 *
 * @returns `true` for affirmative inputs, `false` for negative inputs, and `null` for unrecognized or missing input.
 */
export const parseBooleanFromText = (
    text: string | undefined,
): boolean | null => {
    if (!text) return null;

    const affirmative = ["YES", "Y", "TRUE", "T", "1", "ON", "ENABLE"];
    const negative = ["NO", "N", "FALSE", "F", "0", "OFF", "DISABLE"];

    const normalizedText = text.trim().toUpperCase();

    if (affirmative.includes(normalizedText)) {
        return true;
    } else if (negative.includes(normalizedText)) {
        return false;
    }

    return null;
};

const unsignedIntegerPattern = /^\+?\d+$/;

/**
 * Parses an unsigned decimal integer. Accepts an optional leading "+",
 * rejects signs, fractions, exponents and surrounding whitespace.
 */
export function parseInteger(text: string): number | null {
    if (!unsignedIntegerPattern.test(text)) {
        return null;
    }
    const value = Number.parseInt(text, 10);
    return Number.isSafeInteger(value) ? value : null;
}

/**
 * Counts code points rather than UTF-16 units, so a glyph outside the
 * basic plane still counts as one character.
 */
export function characterCount(text: string): number {
    return Array.from(text).length;
}

export function isSingleCharacter(text: string): boolean {
    return characterCount(text) === 1;
}

export function isIntegerInRange(
    value: number | null,
    min: number,
    max: number,
): value is number {
    return value !== null && Number.isInteger(value) && value >= min && value <= max;
}
