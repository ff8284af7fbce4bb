// Reusable runtime type guards and helpers to safely narrow unknown values

export function isRecord(x: unknown): x is Record<string, unknown> {
    return typeof x === 'object' && x !== null;
}

export function isStringArray(x: unknown): x is string[] {
    return Array.isArray(x) && x.every((v) => typeof v === 'string');
}

/** Finite integer >= min. */
export function isIntegerAtLeast(x: unknown, min: number): x is number {
    return typeof x === 'number' && Number.isFinite(x) && Number.isInteger(x) && x >= min;
}

export function isBoolean(x: unknown): x is boolean {
    return typeof x === 'boolean';
}
