/**
 * Ticketing - Ticket Types
 *
 * - POST   /api/tickets/events/{eventId}/types  - Create `{ name, price, quantity }` (organizer)
 * - GET    /api/tickets/events/{eventId}/types  - List with remaining quota
 * - PATCH  /api/tickets/types/{typeId}          - Update (organizer); quantity never below soldCount
 * - DELETE /api/tickets/types/{typeId}          - Remove with its tickets (organizer)
 *
 * @module commerce/tickets/types
 */

import {
    NotFoundError,
    assertCan,
    created,
    noContent,
    openEvent,
    parseBody,
    pathParam,
    storage,
    success,
    type Action,
    type ApiResponse,
    type AuthenticatedContext,
    type EventAccess,
} from '@social-api/shared';
import type { TicketTypeItem } from '../../../shared_types/ticket';
import { toTicketTypeResponse } from './mapper';
import { createTicketTypeSchema, updateTicketTypeSchema } from './validation';

export interface OpenedTicketType extends EventAccess {
    ticketType: TicketTypeItem;
}

/**
 * @throws NotFoundError if the ticket type or its event does not exist
 * @throws ForbiddenError if the caller may not perform `action`
 */
export async function openTicketType(
    ctx: AuthenticatedContext,
    ticketTypeId: string,
    action: Action
): Promise<OpenedTicketType> {
    const ticketType = await storage.getTicketType(ctx.db, ticketTypeId);
    if (!ticketType) {
        throw NotFoundError.of('Ticket type');
    }
    const access = await openEvent(ctx.db, ctx.user.userId, ticketType.eventId);
    assertCan(access.facts, action);
    return { ticketType, ...access };
}

export async function createTicketType(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:manage-content');

    const input = parseBody(createTicketTypeSchema, ctx.request);
    const ticketType = await storage.createTicketType(ctx.db, event.eventId, input, ctx.user.userId);

    ctx.audit.byUser('TICKET_TYPE_CREATED', ctx.user.userId, {
        eventId: event.eventId,
        ticketTypeId: ticketType.ticketTypeId,
        quantity: ticketType.quantity,
    });

    return created(toTicketTypeResponse(ticketType));
}

export async function listTicketTypes(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:view');

    const ticketTypes = await storage.listTicketTypes(ctx.db, event.eventId);
    return success(ticketTypes.map(toTicketTypeResponse));
}

export async function updateTicketType(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { ticketType } = await openTicketType(ctx, pathParam(ctx, 'typeId'), 'event:manage-content');
    const changes = parseBody(updateTicketTypeSchema, ctx.request);

    const updated = await storage.updateTicketType(ctx.db, ticketType.ticketTypeId, changes);

    ctx.audit.byUser('TICKET_TYPE_UPDATED', ctx.user.userId, {
        ticketTypeId: updated.ticketTypeId,
        fields: Object.keys(changes),
    });

    return success(toTicketTypeResponse(updated));
}

export async function deleteTicketType(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { ticketType } = await openTicketType(ctx, pathParam(ctx, 'typeId'), 'event:manage-content');

    await storage.deleteTicketType(ctx.db, ticketType.ticketTypeId);

    ctx.audit.byUser('TICKET_TYPE_DELETED', ctx.user.userId, { ticketTypeId: ticketType.ticketTypeId });

    return noContent();
}
