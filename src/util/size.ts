const SIZE_PATTERN = /^([0-9]+)([kmgtp]?)b?$/;

const SIZE_MULTIPLIER: Record<string, number> = {
    '': 1,
    k: 2 ** 10,
    m: 2 ** 20,
    g: 2 ** 30,
    t: 2 ** 40,
    p: 2 ** 50,
};

/**
 * Converts a size with an optional unit qualifier into bytes.
 *
 * Qualifiers are case-insensitive binary multiples (`k` = 1024 ... `p` = 1024^5)
 * and may carry a trailing `b`, so `10m`, `10MB` and `10mb` are the same
 * value. A bare `b` means bytes.
 *
 * @returns the number of bytes, or `null` when the text is not a size
 *
 * @example
 * ```typescript
 * convertToBytes('1kb'); // 1024
 * convertToBytes('10m'); // 10485760
 * convertToBytes('10x'); // null
 * ```
 */
export const convertToBytes = (value: string): number | null => {
    const match = SIZE_PATTERN.exec(value.toLowerCase());

    if (!match) {
        return null;
    }

    return Number(match[1]) * SIZE_MULTIPLIER[match[2]];
}
