/**
 * Event & Participation - Organizers
 *
 * - POST   /api/events/{eventId}/organizers           - Add `{ userId }` (organizer)
 * - DELETE /api/events/{eventId}/organizers/{userId}  - Remove (organizer)
 *
 * @module community/events/organizers
 */

import {
    assertCan,
    created,
    noContent,
    openEvent,
    parseBody,
    pathParam,
    storage,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { toOrganizerResponse } from './mapper';
import { addOrganizerSchema } from './validation';

export async function addOrganizer(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:manage-organizers');

    const { userId } = parseBody(addOrganizerSchema, ctx.request);
    const organizer = await storage.addOrganizer(ctx.db, event.eventId, userId);

    ctx.audit.byUser('ORGANIZER_ADDED', ctx.user.userId, { eventId: event.eventId, userId });

    return created(toOrganizerResponse(organizer));
}

export async function removeOrganizer(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:manage-organizers');

    const userId = pathParam(ctx, 'userId');
    await storage.removeOrganizer(ctx.db, event.eventId, userId);

    ctx.audit.byUser('ORGANIZER_REMOVED', ctx.user.userId, { eventId: event.eventId, userId });

    return noContent();
}
