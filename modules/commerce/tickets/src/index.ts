/**
 * Ticketing - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/tickets/events/{eventId}/types
 * - GET    /api/tickets/events/{eventId}/types
 * - PATCH  /api/tickets/types/{typeId}
 * - DELETE /api/tickets/types/{typeId}
 * - POST   /api/tickets/types/{typeId}/purchase
 * - GET    /api/tickets/types/{typeId}/tickets
 *
 * DynamoDB Key Patterns:
 * - Ticket type: PK=TICKET_TYPE#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#TICKET_TYPES
 * - Ticket:      PK=TICKET_TYPE#<id>  SK=TICKET#<normalized_email>
 *
 * @module commerce/tickets
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { listTickets, purchaseTicket } from './purchases';
import { createTicketType, deleteTicketType, listTicketTypes, updateTicketType } from './types';

export const handler = createHandler('tickets', {
    'POST /api/tickets/events/{eventId}/types': authenticatedRoute(createTicketType),
    'GET /api/tickets/events/{eventId}/types': authenticatedRoute(listTicketTypes),
    'PATCH /api/tickets/types/{typeId}': authenticatedRoute(updateTicketType),
    'DELETE /api/tickets/types/{typeId}': authenticatedRoute(deleteTicketType),
    'POST /api/tickets/types/{typeId}/purchase': authenticatedRoute(purchaseTicket),
    'GET /api/tickets/types/{typeId}/tickets': authenticatedRoute(listTickets),
});
