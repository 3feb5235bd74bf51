/**
 * Ticketing - Purchases
 *
 * - POST /api/tickets/types/{typeId}/purchase  - Buy one ticket for an email
 * - GET  /api/tickets/types/{typeId}/tickets   - Sold tickets (organizer)
 *
 * A purchase either increments soldCount and writes the ticket, or writes
 * nothing. A repeated email wins over an exhausted quota (409 before 412).
 *
 * @module commerce/tickets/purchases
 */

import {
    ConflictError,
    PreconditionFailedError,
    created,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import type { PurchaseRejectedDetails } from '../../../shared_types/audit';
import { toTicketResponse } from './mapper';
import { openTicketType } from './types';
import { purchaseSchema } from './validation';

function rejectionReason(err: unknown): PurchaseRejectedDetails['reason'] | null {
    if (err instanceof ConflictError) {
        return 'duplicate_email';
    }
    if (err instanceof PreconditionFailedError) {
        return err.message === storage.TicketMessages.TICKETING_DISABLED ? 'ticketing_disabled' : 'quota_exhausted';
    }
    return null;
}

export async function purchaseTicket(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { ticketType } = await openTicketType(ctx, pathParam(ctx, 'typeId'), 'event:view');
    const purchase = parseBody(purchaseSchema, ctx.request);

    try {
        const ticket = await storage.purchaseTicket(ctx.db, ticketType, purchase, ctx.user.userId);

        ctx.audit.byUser('TICKET_PURCHASED', ctx.user.userId, {
            ticketTypeId: ticketType.ticketTypeId,
            ticketId: ticket.ticketId,
        });

        return created(toTicketResponse(ticket));
    } catch (err) {
        const reason = rejectionReason(err);
        if (reason) {
            ctx.audit.purchaseRejected(ctx.user.userId, { ticketTypeId: ticketType.ticketTypeId, reason });
        }
        throw err;
    }
}

export async function listTickets(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { ticketType } = await openTicketType(ctx, pathParam(ctx, 'typeId'), 'event:manage-content');
    const tickets = await storage.listTickets(ctx.db, ticketType.ticketTypeId);
    return success(tickets.map(toTicketResponse));
}
