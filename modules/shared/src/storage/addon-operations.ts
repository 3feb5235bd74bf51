/**
 * Social Events API - Event Add-on Storage Operations
 *
 * Shopping list items and carpool offers. Item names are unique per event
 * ignoring case, held by a name marker row in the event partition that is
 * written, swapped and deleted together with the item.
 *
 * @module storage/addon-operations
 */

import type { CarpoolOfferItem, ShoppingItem, ShoppingNameItem } from '../../../shared_types/addon';
import { ConflictError, NotFoundError, PreconditionFailedError } from '../errors';
import { isCarpoolOfferItem, isShoppingItem } from '../type-guards';
import { getTyped, newId, queryIndexTyped, splitChanges, timestamp } from './common';
import { IndexKeys, Keys, sortKey } from './keys';
import { ConditionFailedError, type TableGateway, type WriteOperation } from './types';

export interface NewShoppingItem {
    name: string;
    quantity: number;
    arrivalTime: string;
}

export type ShoppingItemChanges = Partial<NewShoppingItem>;

export interface NewCarpoolOffer {
    departureLocation: string;
    departureTime: string;
    price: number;
    availableSeats: number;
    maxDetourMinutes: number;
}

export type CarpoolOfferChanges = Partial<NewCarpoolOffer>;

function nameMarker(eventId: string, name: string, itemId: string, now: string): ShoppingNameItem {
    return {
        ...Keys.shoppingName(eventId, name),
        entityType: 'SHOPPING_NAME',
        itemId,
        createdAt: now,
        updatedAt: now,
    };
}

function sameName(a: string, b: string): boolean {
    return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function duplicateName(name: string): ConflictError {
    return new ConflictError(`Item "${name}" is already on the shopping list`);
}

// =============================================================================
// Shopping List
// =============================================================================

/**
 * @throws PreconditionFailedError if the shopping list is disabled
 * @throws ConflictError if the event already lists an item of that name
 */
export async function createShoppingItem(
    db: TableGateway,
    eventId: string,
    input: NewShoppingItem,
    ownerId: string
): Promise<ShoppingItem> {
    const now = timestamp();
    const itemId = newId();
    const item: ShoppingItem = {
        ...Keys.shoppingItem(itemId),
        GSI1PK: IndexKeys.eventShoppingItems(eventId),
        GSI1SK: sortKey(now, itemId),
        entityType: 'SHOPPING_ITEM',
        itemId,
        eventId,
        ...input,
        ownerId,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await db.transact([
            {
                type: 'check',
                key: Keys.event(eventId),
                conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'shoppingListEnabled', value: true }],
            },
            { type: 'put', item: nameMarker(eventId, input.name, itemId, now), conditions: [{ kind: 'notExists' }] },
            { type: 'put', item, conditions: [{ kind: 'notExists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(0)) throw new PreconditionFailedError('Shopping list is disabled for this event');
            throw duplicateName(input.name);
        }
        throw err;
    }

    return item;
}

export async function getShoppingItem(db: TableGateway, itemId: string): Promise<ShoppingItem | null> {
    return getTyped(db, Keys.shoppingItem(itemId), isShoppingItem);
}

export async function listShoppingItems(db: TableGateway, eventId: string): Promise<ShoppingItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.eventShoppingItems(eventId), isShoppingItem);
}

/**
 * Update an item read as `current`. A rename swaps the name marker in the
 * same transaction and only applies if the name has not changed since.
 *
 * @throws ConflictError on a name taken by another item, or a concurrent rename
 */
export async function updateShoppingItem(
    db: TableGateway,
    current: ShoppingItem,
    changes: ShoppingItemChanges
): Promise<ShoppingItem> {
    const now = timestamp();
    const { set } = splitChanges({ ...changes });
    const renamed = changes.name !== undefined && !sameName(changes.name, current.name);

    const operations: WriteOperation[] = [
        {
            type: 'update',
            key: Keys.shoppingItem(current.itemId),
            set: { ...set, updatedAt: now },
            conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'name', value: current.name }],
        },
    ];
    if (changes.name !== undefined && renamed) {
        operations.push(
            {
                type: 'put',
                item: nameMarker(current.eventId, changes.name, current.itemId, now),
                conditions: [{ kind: 'notExists' }],
            },
            { type: 'delete', key: Keys.shoppingName(current.eventId, current.name) }
        );
    }

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (changes.name !== undefined && err.failedAt(1)) throw duplicateName(changes.name);
            throw new ConflictError('Item was changed by another request');
        }
        throw err;
    }

    const item = await getShoppingItem(db, current.itemId);
    if (!item) {
        throw NotFoundError.of('Shopping item');
    }
    return item;
}

export async function deleteShoppingItem(db: TableGateway, item: ShoppingItem): Promise<void> {
    try {
        await db.transact([
            { type: 'delete', key: Keys.shoppingItem(item.itemId), conditions: [{ kind: 'exists' }] },
            { type: 'delete', key: Keys.shoppingName(item.eventId, item.name) },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Shopping item');
        }
        throw err;
    }
}

// =============================================================================
// Carpooling
// =============================================================================

/**
 * @throws PreconditionFailedError if carpooling is disabled
 */
export async function createCarpoolOffer(
    db: TableGateway,
    eventId: string,
    input: NewCarpoolOffer,
    driverId: string
): Promise<CarpoolOfferItem> {
    const now = timestamp();
    const offerId = newId();
    const offer: CarpoolOfferItem = {
        ...Keys.carpoolOffer(offerId),
        GSI1PK: IndexKeys.eventCarpoolOffers(eventId),
        GSI1SK: sortKey(input.departureTime, offerId),
        entityType: 'CARPOOL_OFFER',
        offerId,
        eventId,
        driverId,
        ...input,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await db.transact([
            {
                type: 'check',
                key: Keys.event(eventId),
                conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'carpoolEnabled', value: true }],
            },
            { type: 'put', item: offer, conditions: [{ kind: 'notExists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError && err.failedAt(0)) {
            throw new PreconditionFailedError('Carpooling is disabled for this event');
        }
        throw err;
    }

    return offer;
}

export async function getCarpoolOffer(db: TableGateway, offerId: string): Promise<CarpoolOfferItem | null> {
    return getTyped(db, Keys.carpoolOffer(offerId), isCarpoolOfferItem);
}

/**
 * Offers of an event ordered by departure time.
 */
export async function listCarpoolOffers(db: TableGateway, eventId: string): Promise<CarpoolOfferItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.eventCarpoolOffers(eventId), isCarpoolOfferItem);
}

export async function updateCarpoolOffer(
    db: TableGateway,
    current: CarpoolOfferItem,
    changes: CarpoolOfferChanges
): Promise<CarpoolOfferItem> {
    const { set } = splitChanges({ ...changes });
    if (changes.departureTime !== undefined) {
        set.GSI1SK = sortKey(changes.departureTime, current.offerId);
    }

    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.carpoolOffer(current.offerId),
                set: { ...set, updatedAt: timestamp() },
                conditions: [{ kind: 'exists' }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Carpool offer');
        }
        throw err;
    }

    const offer = await getCarpoolOffer(db, current.offerId);
    if (!offer) {
        throw NotFoundError.of('Carpool offer');
    }
    return offer;
}

export async function deleteCarpoolOffer(db: TableGateway, offerId: string): Promise<void> {
    try {
        await db.transact([
            { type: 'delete', key: Keys.carpoolOffer(offerId), conditions: [{ kind: 'exists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Carpool offer');
        }
        throw err;
    }
}
