/**
 * Social Events API - Ticketing Storage Operations
 *
 * Key Patterns:
 *   - Ticket type: PK=TICKET_TYPE#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#TICKET_TYPES
 *   - Ticket:      PK=TICKET_TYPE#<id>  SK=TICKET#<normalized_email>
 *
 * A purchase is one transaction: a conditional soldCount increment
 * (soldCount < quantity), the ticket insert (one per email and type) and a
 * check that ticketing is still enabled on the event. soldCount therefore
 * always equals the number of ticket rows and never exceeds quantity.
 *
 * @module storage/ticket-operations
 */

import type { TicketItem, TicketTypeItem } from '../../../shared_types/ticket';
import { KeyPrefixes } from '../constants';
import { ConflictError, NotFoundError, PreconditionFailedError } from '../errors';
import { isTicketItem, isTicketTypeItem } from '../type-guards';
import { getTyped, newId, queryIndexTyped, queryTyped, splitChanges, timestamp, toKey } from './common';
import { IndexKeys, Keys, sortKey } from './keys';
import { ConditionFailedError, type ItemKey, type TableGateway, type WriteCondition } from './types';

export interface NewTicketType {
    name: string;
    price: number;
    quantity: number;
}

export type TicketTypeChanges = Partial<NewTicketType>;

export interface NewPurchase {
    purchaserFirstName: string;
    purchaserLastName: string;
    /** Already normalized */
    purchaserEmail: string;
    purchaserAddress?: string;
}

export const TicketMessages = {
    TICKETING_DISABLED: 'Ticketing is disabled for this event',
    SOLD_OUT: 'No tickets of this type are left',
    DUPLICATE_EMAIL: 'A ticket of this type was already purchased for this email',
    QUANTITY_BELOW_SOLD: 'Quantity cannot be lower than the number of tickets sold',
} as const;

// =============================================================================
// Ticket Types
// =============================================================================

/**
 * @throws PreconditionFailedError if ticketing is disabled for the event
 */
export async function createTicketType(
    db: TableGateway,
    eventId: string,
    input: NewTicketType,
    creatorId: string
): Promise<TicketTypeItem> {
    const now = timestamp();
    const ticketTypeId = newId();
    const ticketType: TicketTypeItem = {
        ...Keys.ticketType(ticketTypeId),
        GSI1PK: IndexKeys.eventTicketTypes(eventId),
        GSI1SK: sortKey(now, ticketTypeId),
        entityType: 'TICKET_TYPE',
        ticketTypeId,
        eventId,
        name: input.name,
        price: input.price,
        quantity: input.quantity,
        soldCount: 0,
        createdById: creatorId,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await db.transact([
            {
                type: 'check',
                key: Keys.event(eventId),
                conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'ticketingEnabled', value: true }],
            },
            { type: 'put', item: ticketType, conditions: [{ kind: 'notExists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError && err.failedAt(0)) {
            throw new PreconditionFailedError(TicketMessages.TICKETING_DISABLED);
        }
        throw err;
    }

    return ticketType;
}

export async function getTicketType(db: TableGateway, ticketTypeId: string): Promise<TicketTypeItem | null> {
    return getTyped(db, Keys.ticketType(ticketTypeId), isTicketTypeItem);
}

export async function listTicketTypes(db: TableGateway, eventId: string): Promise<TicketTypeItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.eventTicketTypes(eventId), isTicketTypeItem);
}

/**
 * A new quantity only applies while it is not below soldCount.
 *
 * @throws ConflictError if the quantity would drop below the tickets sold
 * @throws NotFoundError if the ticket type no longer exists
 */
export async function updateTicketType(
    db: TableGateway,
    ticketTypeId: string,
    changes: TicketTypeChanges
): Promise<TicketTypeItem> {
    const { set } = splitChanges({ ...changes });
    const conditions: WriteCondition[] = [{ kind: 'exists' }];
    if (changes.quantity !== undefined) {
        conditions.push({ kind: 'atMost', attribute: 'soldCount', value: changes.quantity });
    }

    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.ticketType(ticketTypeId),
                set: { ...set, updatedAt: timestamp() },
                conditions,
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            const existing = await getTicketType(db, ticketTypeId);
            if (!existing) throw NotFoundError.of('Ticket type');
            throw new ConflictError(TicketMessages.QUANTITY_BELOW_SOLD);
        }
        throw err;
    }

    const ticketType = await getTicketType(db, ticketTypeId);
    if (!ticketType) {
        throw NotFoundError.of('Ticket type');
    }
    return ticketType;
}

/**
 * Keys of a ticket type and its tickets, ticket type first.
 */
export async function collectTicketTypeKeys(db: TableGateway, ticketTypeId: string): Promise<ItemKey[]> {
    const tickets = await db.query(`${KeyPrefixes.TICKET_TYPE}${ticketTypeId}`, KeyPrefixes.TICKET);
    return [Keys.ticketType(ticketTypeId), ...tickets.flatMap(toKey)];
}

export async function deleteTicketType(db: TableGateway, ticketTypeId: string): Promise<void> {
    await db.deleteAll(await collectTicketTypeKeys(db, ticketTypeId));
}

// =============================================================================
// Tickets
// =============================================================================

/**
 * Sell one ticket of a type.
 *
 * @throws ConflictError if this email already holds a ticket of the type
 * @throws PreconditionFailedError if the quota is exhausted or ticketing is disabled
 */
export async function purchaseTicket(
    db: TableGateway,
    ticketType: TicketTypeItem,
    purchase: NewPurchase,
    buyerId: string
): Promise<TicketItem> {
    const now = timestamp();
    const ticket: TicketItem = {
        ...Keys.ticket(ticketType.ticketTypeId, purchase.purchaserEmail),
        entityType: 'TICKET',
        ticketId: newId(),
        ticketTypeId: ticketType.ticketTypeId,
        eventId: ticketType.eventId,
        purchaserFirstName: purchase.purchaserFirstName,
        purchaserLastName: purchase.purchaserLastName,
        purchaserEmail: purchase.purchaserEmail,
        ...(purchase.purchaserAddress !== undefined && { purchaserAddress: purchase.purchaserAddress }),
        purchasedById: buyerId,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.ticketType(ticketType.ticketTypeId),
                increment: { soldCount: 1 },
                conditions: [
                    { kind: 'exists' },
                    { kind: 'lessThanAttribute', attribute: 'soldCount', limitAttribute: 'quantity' },
                ],
            },
            { type: 'put', item: ticket, conditions: [{ kind: 'notExists' }] },
            {
                type: 'check',
                key: Keys.event(ticketType.eventId),
                conditions: [{ kind: 'equals', attribute: 'ticketingEnabled', value: true }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(1)) throw new ConflictError(TicketMessages.DUPLICATE_EMAIL);
            if (err.failedAt(2)) throw new PreconditionFailedError(TicketMessages.TICKETING_DISABLED);
            throw new PreconditionFailedError(TicketMessages.SOLD_OUT);
        }
        throw err;
    }

    return ticket;
}

export async function listTickets(db: TableGateway, ticketTypeId: string): Promise<TicketItem[]> {
    const tickets = await queryTyped(db, `${KeyPrefixes.TICKET_TYPE}${ticketTypeId}`, KeyPrefixes.TICKET, isTicketItem);
    return tickets.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}
