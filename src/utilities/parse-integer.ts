const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Strict decimal integer: optional sign followed by digits, nothing else.
 * Returns undefined for anything else, including values outside the safe range.
 */
export function parseInteger(text: string): number | undefined {
    if (!INTEGER_PATTERN.test(text)) {
        return undefined;
    }
    const value = Number(text);
    return Number.isSafeInteger(value) ? value : undefined;
}
