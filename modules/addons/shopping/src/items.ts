/**
 * Shopping List - Items
 *
 * - POST   /api/shopping/events/{eventId}/items  - `{ name, quantity, arrivalTime }`
 * - GET    /api/shopping/events/{eventId}/items
 * - PATCH  /api/shopping/items/{itemId}          - Owner or organizer
 * - DELETE /api/shopping/items/{itemId}          - Owner or organizer
 *
 * Names are unique per event regardless of case.
 *
 * @module addons/shopping/items
 */

import {
    NotFoundError,
    assertCan,
    created,
    noContent,
    openEvent,
    ownedBy,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
    type EventAccess,
} from '@social-api/shared';
import type { ShoppingItem } from '../../../shared_types/addon';
import { createItemSchema, updateItemSchema } from './validation';

export interface ShoppingItemResponse {
    id: string;
    eventId: string;
    name: string;
    quantity: number;
    arrivalTime: string;
    ownerId: string;
    createdAt: string;
}

export function toItemResponse(item: ShoppingItem): ShoppingItemResponse {
    return {
        id: item.itemId,
        eventId: item.eventId,
        name: item.name,
        quantity: item.quantity,
        arrivalTime: item.arrivalTime,
        ownerId: item.ownerId,
        createdAt: item.createdAt,
    };
}

async function openEventWithAccess(ctx: AuthenticatedContext, eventId: string): Promise<EventAccess> {
    const access = await openEvent(ctx.db, ctx.user.userId, eventId);
    assertCan(access.facts, 'event:access');
    return access;
}

/**
 * Load an item the caller may change.
 */
async function openOwnItem(ctx: AuthenticatedContext): Promise<ShoppingItem> {
    const item = await storage.getShoppingItem(ctx.db, pathParam(ctx, 'itemId'));
    if (!item) {
        throw NotFoundError.of('Shopping item');
    }
    const access = await openEventWithAccess(ctx, item.eventId);
    assertCan(ownedBy(access, item.ownerId), 'resource:modify');
    return item;
}

export async function createItem(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event } = await openEventWithAccess(ctx, pathParam(ctx, 'eventId'));
    const input = parseBody(createItemSchema, ctx.request);

    const item = await storage.createShoppingItem(ctx.db, event.eventId, input, ctx.user.userId);

    ctx.audit.byUser('SHOPPING_ITEM_CREATED', ctx.user.userId, { eventId: event.eventId, itemId: item.itemId });

    return created(toItemResponse(item));
}

export async function listItems(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event } = await openEventWithAccess(ctx, pathParam(ctx, 'eventId'));
    const items = await storage.listShoppingItems(ctx.db, event.eventId);
    return success(items.map(toItemResponse));
}

export async function updateItem(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const current = await openOwnItem(ctx);
    const changes = parseBody(updateItemSchema, ctx.request);

    const item = await storage.updateShoppingItem(ctx.db, current, changes);

    ctx.audit.byUser('SHOPPING_ITEM_UPDATED', ctx.user.userId, { itemId: item.itemId, fields: Object.keys(changes) });

    return success(toItemResponse(item));
}

export async function deleteItem(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const item = await openOwnItem(ctx);

    await storage.deleteShoppingItem(ctx.db, item);

    ctx.audit.byUser('SHOPPING_ITEM_DELETED', ctx.user.userId, { itemId: item.itemId });

    return noContent();
}
