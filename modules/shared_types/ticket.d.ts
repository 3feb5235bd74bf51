/**
 * Social Events API - Ticketing Entity Types
 *
 * Key Patterns:
 *   - Ticket type: PK=TICKET_TYPE#<id>  SK=METADATA
 *                  GSI1PK=EVENT#<event_id>#TICKET_TYPES
 *   - Ticket:      PK=TICKET_TYPE#<id>  SK=TICKET#<normalized_email>
 *
 * soldCount is incremented in the same transaction that inserts a ticket,
 * under the condition soldCount < quantity.
 */

import type { BaseItem } from './base';

export interface TicketTypeItem extends BaseItem {
    PK: `TICKET_TYPE#${string}`;
    SK: 'METADATA';
    GSI1PK: string;
    GSI1SK: string;
    entityType: 'TICKET_TYPE';

    ticketTypeId: string;
    eventId: string;
    name: string;
    price: number;
    /** Maximum number of tickets that can be sold */
    quantity: number;
    soldCount: number;
    createdById: string;
}

export interface TicketItem extends BaseItem {
    PK: `TICKET_TYPE#${string}`;
    SK: `TICKET#${string}`;
    entityType: 'TICKET';

    ticketId: string;
    ticketTypeId: string;
    eventId: string;
    purchaserFirstName: string;
    purchaserLastName: string;
    purchaserEmail: string;
    purchaserAddress?: string;
    purchasedById: string;
}
