/**
 * Metadata cleanup.
 *
 * @module normalizeMetadata
 */

import { MetadataRecord, MetadataValue } from '../types';

/**
 * Tells whether a metadata value is a nested record.
 */
export const isMetadataRecord = (value: MetadataValue): value is MetadataRecord => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Stores a value under a key as an own property, including keys such as `__proto__`.
 */
export const setMetadataEntry = <T>(record: Record<string, T>, key: string, value: T): void => {
    Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
};

/**
 * Normalizes one value. `undefined` means the value is empty and its key has to go.
 */
const normalizeValue = (value: MetadataValue): MetadataValue => {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed === '' ? undefined : trimmed;
    }

    if (Array.isArray(value)) {
        const items: MetadataValue[] = [];
        for (const item of value) {
            if (typeof item === 'string' || Array.isArray(item) || isMetadataRecord(item)) {
                const normalized = normalizeValue(item);
                if (normalized !== undefined) items.push(normalized);
            } else if (item) {
                items.push(item);
            }
        }
        return items.length > 0 ? items : undefined;
    }

    if (isMetadataRecord(value)) {
        const normalized = normalizeMetadata(value);
        return Object.keys(normalized).length > 0 ? normalized : undefined;
    }

    return value;
};

/**
 * Removes empty metadata at any nesting depth.
 *
 * Strings are trimmed and dropped when nothing is left. Arrays lose their empty strings and falsy
 * non-string items and are dropped when empty. Records are normalized recursively and dropped when empty.
 * Other scalars are kept as they are. The input is not modified, and normalizing twice gives the same result
 * as normalizing once.
 *
 * @example
 * ```typescript
 * normalizeMetadata({ Title: ' Paper ', Subject: '', dc: { subject: ['', ' pdf '], rights: {} } });
 * // { Title: 'Paper', dc: { subject: ['pdf'] } }
 * ```
 */
export const normalizeMetadata = (metadata: MetadataRecord): MetadataRecord => {
    const result: MetadataRecord = {};
    for (const [key, value] of Object.entries(metadata)) {
        const normalized = normalizeValue(value);
        if (normalized !== undefined) {
            setMetadataEntry(result, key, normalized);
        }
    }
    return result;
};
