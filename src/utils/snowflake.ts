/** Start of the source platform's ID epoch (2015-01-01T00:00:00Z). */
const SOURCE_EPOCH_MS = 1_420_070_400_000n;
const NUMERIC_ID = /^\d+$/;

export function isNumericId(id: string): boolean {
    return NUMERIC_ID.test(id);
}

/**
 * Ordering used for every ID comparison in the relay: numeric IDs compare
 * numerically, non-numeric IDs rank as zero, ties fall back to string order.
 */
export function compareIds(a: string, b: string): number {
    const left = isNumericId(a) ? BigInt(a) : 0n;
    const right = isNumericId(b) ? BigInt(b) : 0n;
    if (left !== right) return left < right ? -1 : 1;
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/** Smallest snowflake a message created at `moment` could carry. */
export function snowflakeFromDate(moment: Date): bigint {
    const elapsed = BigInt(moment.getTime()) - SOURCE_EPOCH_MS;
    if (elapsed < 0n) return 0n;
    return elapsed << 22n;
}

export function parseTimestamp(value: string | null | undefined): Date | null {
    if (!value) return null;
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * True when a message was created at or before `moment`, judged by its
 * snowflake when numeric and by its reported timestamp otherwise (either
 * signal is enough).
 */
export function isAtOrBefore(
    message: { id: string; timestamp: string | null },
    moment: Date,
    marker: bigint = snowflakeFromDate(moment),
): boolean {
    if (isNumericId(message.id) && BigInt(message.id) <= marker) {
        return true;
    }
    const created = parseTimestamp(message.timestamp);
    return created !== null && created.getTime() <= moment.getTime();
}
