/**
 * Social Events API - Storage Helpers
 *
 * Typed reads on top of the gateway and small value helpers shared by the
 * entity operation modules.
 *
 * @module storage/common
 */

import { randomUUID } from 'node:crypto';
import type { ItemKey, StoredItem, TableGateway } from './types';

/** Narrowing function for a stored row */
export type ItemGuard<T> = (item: unknown) => item is T;

/**
 * Read one item and narrow it, null when absent or of another entity type.
 */
export async function getTyped<T>(
    db: TableGateway,
    key: ItemKey,
    guard: ItemGuard<T>
): Promise<T | null> {
    const item = await db.get(key);
    return guard(item) ? item : null;
}

/**
 * Query a partition and keep the rows the guard accepts.
 */
export async function queryTyped<T>(
    db: TableGateway,
    pk: string,
    skPrefix: string | undefined,
    guard: ItemGuard<T>
): Promise<T[]> {
    const items = await db.query(pk, skPrefix);
    return items.flatMap((item) => (guard(item) ? [item] : []));
}

/**
 * Query a GSI1/GSI2 partition and keep the rows the guard accepts.
 */
export async function queryIndexTyped<T>(
    db: TableGateway,
    index: 'GSI1' | 'GSI2',
    pk: string,
    guard: ItemGuard<T>
): Promise<T[]> {
    const items = await db.queryIndex(index, pk);
    return items.flatMap((item) => (guard(item) ? [item] : []));
}

export function newId(): string {
    return randomUUID();
}

export function timestamp(): string {
    return new Date().toISOString();
}

/**
 * Split a partial change set into attributes to set and attributes to remove.
 * `null` removes an optional attribute, `undefined` leaves it untouched.
 */
export function splitChanges(changes: Record<string, unknown>): {
    set: Record<string, unknown>;
    remove: string[];
} {
    const set: Record<string, unknown> = {};
    const remove: string[] = [];
    for (const [attribute, value] of Object.entries(changes)) {
        if (value === null) {
            remove.push(attribute);
        } else if (value !== undefined) {
            set[attribute] = value;
        }
    }
    return { set, remove };
}

/**
 * Key of a raw row, as a zero- or one-element list for use with flatMap.
 */
export function toKey(item: StoredItem): ItemKey[] {
    const { PK, SK } = item;
    return typeof PK === 'string' && typeof SK === 'string' ? [{ PK, SK }] : [];
}
