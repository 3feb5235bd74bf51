/**
 * Ticketing - Response Mapping
 *
 * @module commerce/tickets/mapper
 */

import type { TicketItem, TicketTypeItem } from '../../../shared_types/ticket';

export interface TicketTypeResponse {
    id: string;
    eventId: string;
    name: string;
    price: number;
    quantity: number;
    soldCount: number;
    remaining: number;
    createdAt: string;
}

export interface TicketResponse {
    id: string;
    ticketTypeId: string;
    eventId: string;
    purchaserFirstName: string;
    purchaserLastName: string;
    purchaserEmail: string;
    purchaserAddress?: string;
    purchasedAt: string;
}

export function toTicketTypeResponse(ticketType: TicketTypeItem): TicketTypeResponse {
    return {
        id: ticketType.ticketTypeId,
        eventId: ticketType.eventId,
        name: ticketType.name,
        price: ticketType.price,
        quantity: ticketType.quantity,
        soldCount: ticketType.soldCount,
        remaining: Math.max(ticketType.quantity - ticketType.soldCount, 0),
        createdAt: ticketType.createdAt,
    };
}

export function toTicketResponse(ticket: TicketItem): TicketResponse {
    return {
        id: ticket.ticketId,
        ticketTypeId: ticket.ticketTypeId,
        eventId: ticket.eventId,
        purchaserFirstName: ticket.purchaserFirstName,
        purchaserLastName: ticket.purchaserLastName,
        purchaserEmail: ticket.purchaserEmail,
        purchaserAddress: ticket.purchaserAddress,
        purchasedAt: ticket.createdAt,
    };
}
