/**
 * Social Events API - Event Add-on Entity Types
 *
 * Key Patterns:
 *   - Shopping item:  PK=SHOPPING_ITEM#<id>  SK=METADATA
 *                     GSI1PK=EVENT#<event_id>#SHOPPING_ITEMS
 *   - Name marker:    PK=EVENT#<event_id>    SK=SHOPPING_NAME#<lower-case name>
 *   - Carpool offer:  PK=CARPOOL_OFFER#<id>  SK=METADATA
 *                     GSI1PK=EVENT#<event_id>#CARPOOL_OFFERS
 */

import type { BaseItem } from './base';

export interface ShoppingItem extends BaseItem {
    PK: `SHOPPING_ITEM#${string}`;
    SK: 'METADATA';
    GSI1PK: string;
    GSI1SK: string;
    entityType: 'SHOPPING_ITEM';

    itemId: string;
    eventId: string;
    name: string;
    quantity: number;
    /** ISO 8601 time the item will be brought */
    arrivalTime: string;
    ownerId: string;
}

export interface ShoppingNameItem extends BaseItem {
    PK: `EVENT#${string}`;
    SK: `SHOPPING_NAME#${string}`;
    entityType: 'SHOPPING_NAME';

    itemId: string;
}

export interface CarpoolOfferItem extends BaseItem {
    PK: `CARPOOL_OFFER#${string}`;
    SK: 'METADATA';
    GSI1PK: string;
    GSI1SK: string;
    entityType: 'CARPOOL_OFFER';

    offerId: string;
    eventId: string;
    driverId: string;
    departureLocation: string;
    /** ISO 8601 */
    departureTime: string;
    price: number;
    availableSeats: number;
    maxDetourMinutes: number;
}
