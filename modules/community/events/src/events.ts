/**
 * Event & Participation - Event CRUD
 *
 * - POST   /api/events            - Create, optionally inside a group
 * - GET    /api/events            - Events visible to the caller (`?groupId=` narrows)
 * - GET    /api/events/{eventId}  - Event with organizers and participants
 * - PATCH  /api/events/{eventId}  - Update fields and feature flags (organizer)
 * - DELETE /api/events/{eventId}  - Delete with everything it owns (creator or group admin)
 *
 * @module community/events/events
 */

import {
    NotFoundError,
    ValidationError,
    assertCan,
    created,
    isAllowed,
    loadFacts,
    noContent,
    openEvent,
    parseBody,
    pathParam,
    queryParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import type { EventItem } from '../../../shared_types/event';
import {
    toEventResponse,
    toOrganizerResponse,
    toParticipantResponse,
    type EventDetailResponse,
} from './mapper';
import { DATE_ORDER_MESSAGE, createEventSchema, isAfter, updateEventSchema } from './validation';

export async function createEvent(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { organizerIds, ...input } = parseBody(createEventSchema, ctx.request);

    if (input.groupId !== undefined) {
        const group = await storage.getGroup(ctx.db, input.groupId);
        if (!group) {
            throw NotFoundError.of('Group');
        }
        assertCan(await loadFacts(ctx.db, ctx.user.userId, { kind: 'group', group }), 'group:create-event');
    }

    const { event, organizers } = await storage.createEvent(ctx.db, input, ctx.user.userId, organizerIds);

    ctx.audit.byUser('EVENT_CREATED', ctx.user.userId, {
        eventId: event.eventId,
        groupId: event.groupId,
        organizers: organizers.map((o) => o.userId),
    });

    return created(toEventResponse(event));
}

export async function listEvents(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const groupId = queryParam(ctx, 'groupId');
    const events = groupId !== undefined
        ? await storage.listGroupEvents(ctx.db, groupId)
        : await storage.listEvents(ctx.db);

    const verdicts = await Promise.all(
        events.map((event) =>
            event.isPrivate
                ? isAllowed(ctx.db, ctx.user.userId, { kind: 'event', event }, 'event:view')
                : Promise.resolve(true)
        )
    );
    const visible: EventItem[] = events.filter((_, i) => verdicts[i]);

    return success(visible.map(toEventResponse));
}

export async function getEvent(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:view');

    const [organizers, participants] = await Promise.all([
        storage.listOrganizers(ctx.db, event.eventId),
        storage.listParticipants(ctx.db, event.eventId),
    ]);

    const body: EventDetailResponse = {
        ...toEventResponse(event),
        organizers: organizers.map(toOrganizerResponse),
        participants: participants.map(toParticipantResponse),
    };
    return success(body);
}

export async function updateEvent(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:update');

    const changes = parseBody(updateEventSchema, ctx.request);
    if (!isAfter(changes.endDate ?? event.endDate, changes.startDate ?? event.startDate)) {
        throw ValidationError.field('endDate', DATE_ORDER_MESSAGE);
    }

    const updated = await storage.updateEvent(ctx.db, event, changes);

    ctx.audit.byUser('EVENT_UPDATED', ctx.user.userId, {
        eventId: event.eventId,
        fields: Object.keys(changes),
    });

    return success(toEventResponse(updated));
}

export async function deleteEvent(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:delete');

    await storage.deleteEventCascade(ctx.db, event.eventId);

    ctx.audit.byUser('EVENT_DELETED', ctx.user.userId, { eventId: event.eventId });

    return noContent();
}
