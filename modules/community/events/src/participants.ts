/**
 * Event & Participation - Participants
 *
 * - POST   /api/events/{eventId}/participants           - Join, or add someone (organizer)
 * - PATCH  /api/events/{eventId}/participants/{userId}  - Change status (self or organizer)
 * - DELETE /api/events/{eventId}/participants/{userId}  - Leave, or remove someone (organizer)
 *
 * @module community/events/participants
 */

import {
    assertCan,
    created,
    noContent,
    openEvent,
    parseBody,
    pathParam,
    storage,
    success,
    type AccessFacts,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { toParticipantResponse } from './mapper';
import { addParticipantSchema, updateParticipantSchema } from './validation';

function assertSelfOrManager(ctx: AuthenticatedContext, facts: AccessFacts, userId: string): void {
    if (userId !== ctx.user.userId) {
        assertCan(facts, 'event:manage-participants');
    }
}

export async function addParticipant(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));

    const input = parseBody(addParticipantSchema, ctx.request);
    const userId = input.userId ?? ctx.user.userId;
    assertCan(facts, userId === ctx.user.userId ? 'event:join' : 'event:manage-participants');

    const participant = await storage.addParticipant(ctx.db, event.eventId, userId, input.status);

    ctx.audit.byUser('PARTICIPANT_ADDED', ctx.user.userId, {
        eventId: event.eventId,
        userId,
        status: input.status,
    });

    return created(toParticipantResponse(participant));
}

export async function updateParticipant(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    const userId = pathParam(ctx, 'userId');
    assertSelfOrManager(ctx, facts, userId);

    const { status } = parseBody(updateParticipantSchema, ctx.request);
    const participant = await storage.updateParticipantStatus(ctx.db, event.eventId, userId, status);

    ctx.audit.byUser('PARTICIPANT_UPDATED', ctx.user.userId, { eventId: event.eventId, userId, status });

    return success(toParticipantResponse(participant));
}

export async function removeParticipant(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    const userId = pathParam(ctx, 'userId');
    assertSelfOrManager(ctx, facts, userId);

    await storage.removeParticipant(ctx.db, event.eventId, userId);

    ctx.audit.byUser('PARTICIPANT_REMOVED', ctx.user.userId, { eventId: event.eventId, userId });

    return noContent();
}
