import { CacheEntry, CountValue, EntryKind, EntryStatus } from '../types/interfaces';

/** Marker appended to values produced by the local fallback estimator. */
export const ESTIMATED_MARKER = '~';
/** Marker appended to values synthesized for files over the size ceiling. */
export const OVERSIZED_MARKER = '*';
/** Display text for counts of a billion and above. */
export const LARGE_TEXT = 'LARGE';

/** What `parseCountDisplay` returns for `LARGE`. */
export const LARGE_COUNT_SENTINEL = Number.MAX_SAFE_INTEGER;
/** What `parseCountDisplay` returns for placeholders and text it cannot read; summing it is a no-op. */
export const UNKNOWN_COUNT_SENTINEL = 0;

function oneDecimal(n: number): string {
    return n.toFixed(1).replace(/\.0$/, '');
}

/**
 * Format a count with k/M suffixes.
 *   0–999 → "0" … "999"
 *   1 000–999 999 → "1k" … "999.9k"
 *   1 000 000–999 999 999 → "1M" … "999.9M"
 *   1 000 000 000+ → "LARGE"
 */
export function formatCount(n: number): string {
    const count = Math.max(0, Math.floor(n));
    if (count < 1000) {
        return count.toString();
    }
    if (count < 1_000_000) {
        const k = Math.round(count / 100) / 10;
        // 999 950 rounds up to 1000k; show it as 1M instead
        if (k < 1000) {
            return oneDecimal(k) + 'k';
        }
    }
    if (count < 1_000_000_000) {
        const m = Math.round(count / 100_000) / 10;
        // likewise 999 950 000 would read 1000M
        if (m < 1000) {
            return oneDecimal(m) + 'M';
        }
    }
    return LARGE_TEXT;
}

export function markerFor(status: EntryStatus): string {
    if (status === 'estimated') {
        return ESTIMATED_MARKER;
    }
    if (status === 'oversized') {
        return OVERSIZED_MARKER;
    }
    return '';
}

export function toCountValue(value: number, status: CountValue['status']): CountValue {
    const rounded = Math.max(0, Math.floor(value));
    return Object.freeze({ value: rounded, status, displayText: formatCount(rounded) + markerFor(status) });
}

/** Build a frozen entry whose `displayText` is derived from `value` and `status` in one step. */
export function createEntry(key: string, kind: EntryKind, count: CountValue, computedAt: number): CacheEntry {
    return Object.freeze({
        key,
        kind,
        status: count.status,
        value: count.value,
        displayText: count.displayText,
        computedAt,
    });
}

/** The provisional entry handed out while a key is queued or in flight. Never stored. */
export function createPlaceholder(key: string, kind: EntryKind, placeholderText: string, computedAt: number): CacheEntry {
    return Object.freeze({ key, kind, status: 'processing', value: null, displayText: placeholderText, computedAt });
}

const DISPLAY_RE = /^(\d+(?:\.\d+)?)([kM]?)([~*]?)$/;

/**
 * Approximate inverse of `formatCount` for text that has already been
 * rendered elsewhere. Inside the process, sum `CacheEntry.value` instead.
 */
export function parseCountDisplay(text: string): number {
    const trimmed = text.trim();
    if (trimmed === LARGE_TEXT || trimmed === LARGE_TEXT + ESTIMATED_MARKER || trimmed === LARGE_TEXT + OVERSIZED_MARKER) {
        return LARGE_COUNT_SENTINEL;
    }
    const match = DISPLAY_RE.exec(trimmed);
    if (!match) {
        return UNKNOWN_COUNT_SENTINEL;
    }
    const base = Number(match[1]);
    const multiplier = match[2] === 'M' ? 1_000_000 : match[2] === 'k' ? 1000 : 1;
    return Math.round(base * multiplier);
}
