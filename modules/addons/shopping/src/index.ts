/**
 * Shopping List - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/shopping/events/{eventId}/items
 * - GET    /api/shopping/events/{eventId}/items
 * - PATCH  /api/shopping/items/{itemId}
 * - DELETE /api/shopping/items/{itemId}
 *
 * DynamoDB Key Patterns:
 * - Item:        PK=SHOPPING_ITEM#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#SHOPPING_ITEMS
 * - Name marker: PK=EVENT#<event_id>    SK=SHOPPING_NAME#<lower-case name>
 *
 * @module addons/shopping
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { createItem, deleteItem, listItems, updateItem } from './items';

export const handler = createHandler('shopping', {
    'POST /api/shopping/events/{eventId}/items': authenticatedRoute(createItem),
    'GET /api/shopping/events/{eventId}/items': authenticatedRoute(listItems),
    'PATCH /api/shopping/items/{itemId}': authenticatedRoute(updateItem),
    'DELETE /api/shopping/items/{itemId}': authenticatedRoute(deleteItem),
});
