/**
 * Social Events API - Event Storage Operations
 *
 * Key Patterns:
 *   - Event:       PK=EVENT#<id>  SK=METADATA
 *   - Organizer:   PK=EVENT#<id>  SK=ORGANIZER#<user_id>
 *   - Participant: PK=EVENT#<id>  SK=PARTICIPANT#<user_id>
 *
 * Organizer and participant rows are join records created on add and
 * deleted on remove. The event's organizerCount moves with the organizer
 * rows so the last organizer cannot be removed.
 *
 * @module storage/event-operations
 */

import type {
    EventItem,
    EventOrganizerItem,
    EventParticipantItem,
    ParticipantStatus,
} from '../../../shared_types/event';
import { KeyPrefixes } from '../constants';
import { ConflictError, NotFoundError } from '../errors';
import { isEventItem, isOrganizerItem, isParticipantItem } from '../type-guards';
import { getTyped, newId, queryIndexTyped, queryTyped, splitChanges, timestamp } from './common';
import { IndexKeys, Keys, sortKey } from './keys';
import {
    ConditionFailedError,
    type TableGateway,
    type WriteCondition,
    type WriteOperation,
} from './types';

export interface NewEvent {
    name: string;
    description?: string;
    startDate: string;
    endDate: string;
    location: string;
    coverPhoto?: string;
    isPrivate: boolean;
    groupId?: string;
    pollsEnabled: boolean;
    ticketingEnabled: boolean;
    shoppingListEnabled: boolean;
    carpoolEnabled: boolean;
}

export type EventChanges = {
    [K in Exclude<keyof NewEvent, 'groupId'>]?: NewEvent[K] | null;
};

function buildOrganizer(eventId: string, userId: string, now: string): EventOrganizerItem {
    return {
        ...Keys.organizer(eventId, userId),
        entityType: 'EVENT_ORGANIZER',
        eventId,
        userId,
        createdAt: now,
        updatedAt: now,
    };
}

// =============================================================================
// Events
// =============================================================================

/**
 * Create an event with its organizer links in one transaction.
 * The creator is always an organizer; every other organizer must exist.
 *
 * @throws NotFoundError if the group or an organizer does not exist
 */
export async function createEvent(
    db: TableGateway,
    input: NewEvent,
    creatorId: string,
    organizerIds: string[]
): Promise<{ event: EventItem; organizers: EventOrganizerItem[] }> {
    const now = timestamp();
    const eventId = newId();
    const allOrganizers = [creatorId, ...organizerIds.filter((id) => id !== creatorId)];
    const uniqueOrganizers = [...new Set(allOrganizers)];

    const event: EventItem = {
        ...Keys.event(eventId),
        ...(input.groupId !== undefined && {
            GSI1PK: IndexKeys.groupEvents(input.groupId),
            GSI1SK: sortKey(input.startDate, eventId),
        }),
        GSI2PK: IndexKeys.eventCatalog,
        GSI2SK: sortKey(input.startDate, eventId),
        entityType: 'EVENT',
        eventId,
        ...input,
        createdById: creatorId,
        organizerCount: uniqueOrganizers.length,
        createdAt: now,
        updatedAt: now,
    };
    const organizers = uniqueOrganizers.map((userId) => buildOrganizer(eventId, userId, now));

    const operations: WriteOperation[] = [
        { type: 'put', item: event, conditions: [{ kind: 'notExists' }] },
        ...organizers.map((item): WriteOperation => ({ type: 'put', item })),
    ];
    const userChecks = uniqueOrganizers.slice(1);
    const firstUserCheck = operations.length;
    operations.push(
        ...userChecks.map((userId): WriteOperation => ({
            type: 'check',
            key: Keys.user(userId),
            conditions: [{ kind: 'exists' }],
        }))
    );
    const groupCheck = operations.length;
    if (input.groupId) {
        operations.push({ type: 'check', key: Keys.group(input.groupId), conditions: [{ kind: 'exists' }] });
    }

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            const failure = err;
            if (input.groupId && failure.failedAt(groupCheck)) {
                throw NotFoundError.of('Group');
            }
            const missing = userChecks.find((_, i) => failure.failedAt(firstUserCheck + i));
            if (missing) {
                throw new NotFoundError(`Organizer ${missing} not found`);
            }
        }
        throw err;
    }

    return { event, organizers };
}

export async function getEvent(db: TableGateway, eventId: string): Promise<EventItem | null> {
    return getTyped(db, Keys.event(eventId), isEventItem);
}

/**
 * All events ordered by start date.
 */
export async function listEvents(db: TableGateway): Promise<EventItem[]> {
    return queryIndexTyped(db, 'GSI2', IndexKeys.eventCatalog, isEventItem);
}

/**
 * Events of one group ordered by start date.
 */
export async function listGroupEvents(db: TableGateway, groupId: string): Promise<EventItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.groupEvents(groupId), isEventItem);
}

/**
 * Apply changes to an event read as `current`. When the dates move, the
 * write only applies if neither date changed since the read, so the
 * start/end ordering checked by the caller still holds.
 *
 * @throws ConflictError on a concurrent date change
 */
export async function updateEvent(
    db: TableGateway,
    current: EventItem,
    changes: EventChanges
): Promise<EventItem> {
    const { set, remove } = splitChanges(changes);
    const conditions: WriteCondition[] = [{ kind: 'exists' }];

    if (set.startDate !== undefined || set.endDate !== undefined) {
        conditions.push(
            { kind: 'equals', attribute: 'startDate', value: current.startDate },
            { kind: 'equals', attribute: 'endDate', value: current.endDate }
        );
        if (typeof set.startDate === 'string') {
            set.GSI2SK = sortKey(set.startDate, current.eventId);
            if (current.groupId) {
                set.GSI1SK = sortKey(set.startDate, current.eventId);
            }
        }
    }

    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.event(current.eventId),
                set: { ...set, updatedAt: timestamp() },
                remove,
                conditions,
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw new ConflictError('Event was changed by another request');
        }
        throw err;
    }

    const event = await getEvent(db, current.eventId);
    if (!event) {
        throw NotFoundError.of('Event');
    }
    return event;
}

// =============================================================================
// Organizers
// =============================================================================

export async function getOrganizer(
    db: TableGateway,
    eventId: string,
    userId: string
): Promise<EventOrganizerItem | null> {
    return getTyped(db, Keys.organizer(eventId, userId), isOrganizerItem);
}

export async function listOrganizers(db: TableGateway, eventId: string): Promise<EventOrganizerItem[]> {
    return queryTyped(db, `${KeyPrefixes.EVENT}${eventId}`, KeyPrefixes.ORGANIZER, isOrganizerItem);
}

/**
 * @throws NotFoundError if the user or the event does not exist
 * @throws ConflictError if the user already organizes the event
 */
export async function addOrganizer(
    db: TableGateway,
    eventId: string,
    userId: string
): Promise<EventOrganizerItem> {
    const organizer = buildOrganizer(eventId, userId, timestamp());

    try {
        await db.transact([
            { type: 'check', key: Keys.user(userId), conditions: [{ kind: 'exists' }] },
            { type: 'put', item: organizer, conditions: [{ kind: 'notExists' }] },
            {
                type: 'update',
                key: Keys.event(eventId),
                increment: { organizerCount: 1 },
                conditions: [{ kind: 'exists' }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(2)) throw NotFoundError.of('Event');
            if (err.failedAt(0)) throw NotFoundError.of('User');
            throw new ConflictError('User is already an organizer of this event');
        }
        throw err;
    }

    return organizer;
}

/**
 * @throws NotFoundError if the user is not an organizer
 * @throws ConflictError when removing the last organizer
 */
export async function removeOrganizer(db: TableGateway, eventId: string, userId: string): Promise<void> {
    try {
        await db.transact([
            { type: 'delete', key: Keys.organizer(eventId, userId), conditions: [{ kind: 'exists' }] },
            {
                type: 'update',
                key: Keys.event(eventId),
                increment: { organizerCount: -1 },
                conditions: [{ kind: 'greaterThan', attribute: 'organizerCount', value: 1 }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(0)) throw NotFoundError.of('Organizer');
            throw new ConflictError('An event must keep at least one organizer');
        }
        throw err;
    }
}

// =============================================================================
// Participants
// =============================================================================

export async function getParticipant(
    db: TableGateway,
    eventId: string,
    userId: string
): Promise<EventParticipantItem | null> {
    return getTyped(db, Keys.participant(eventId, userId), isParticipantItem);
}

export async function listParticipants(db: TableGateway, eventId: string): Promise<EventParticipantItem[]> {
    return queryTyped(db, `${KeyPrefixes.EVENT}${eventId}`, KeyPrefixes.PARTICIPANT, isParticipantItem);
}

/**
 * @throws NotFoundError if the user or the event does not exist
 * @throws ConflictError if the user already participates
 */
export async function addParticipant(
    db: TableGateway,
    eventId: string,
    userId: string,
    status: ParticipantStatus
): Promise<EventParticipantItem> {
    const now = timestamp();
    const participant: EventParticipantItem = {
        ...Keys.participant(eventId, userId),
        entityType: 'EVENT_PARTICIPANT',
        eventId,
        userId,
        status,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await db.transact([
            { type: 'check', key: Keys.user(userId), conditions: [{ kind: 'exists' }] },
            { type: 'put', item: participant, conditions: [{ kind: 'notExists' }] },
            { type: 'check', key: Keys.event(eventId), conditions: [{ kind: 'exists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(2)) throw NotFoundError.of('Event');
            if (err.failedAt(0)) throw NotFoundError.of('User');
            throw new ConflictError('User is already a participant of this event');
        }
        throw err;
    }

    return participant;
}

/**
 * @throws NotFoundError if the user is not a participant
 */
export async function updateParticipantStatus(
    db: TableGateway,
    eventId: string,
    userId: string,
    status: ParticipantStatus
): Promise<EventParticipantItem> {
    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.participant(eventId, userId),
                set: { status, updatedAt: timestamp() },
                conditions: [{ kind: 'exists' }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Participant');
        }
        throw err;
    }

    const participant = await getParticipant(db, eventId, userId);
    if (!participant) {
        throw NotFoundError.of('Participant');
    }
    return participant;
}

/**
 * @throws NotFoundError if the user is not a participant
 */
export async function removeParticipant(db: TableGateway, eventId: string, userId: string): Promise<void> {
    try {
        await db.transact([
            { type: 'delete', key: Keys.participant(eventId, userId), conditions: [{ kind: 'exists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Participant');
        }
        throw err;
    }
}
