/**
 * Social Events API - Access to Event-Scoped Resources
 *
 * Every resource below an event (threads, albums, polls, ticket types,
 * add-ons) is checked against the facts of its event. A route resolves
 * the event once and reuses the facts for every check it makes.
 *
 * @module access/resources
 */

import type { EventItem } from '../../../shared_types/event';
import { NotFoundError } from '../errors';
import { getEvent } from '../storage/event-operations';
import type { TableGateway } from '../storage/types';
import { loadFacts, type AccessFacts } from './capabilities';

export interface EventAccess {
    event: EventItem;
    facts: AccessFacts;
}

/**
 * Load an event with the actor's facts about it.
 *
 * @throws NotFoundError if the event does not exist
 */
export async function openEvent(db: TableGateway, actorId: string, eventId: string): Promise<EventAccess> {
    const event = await getEvent(db, eventId);
    if (!event) {
        throw NotFoundError.of('Event');
    }
    return { event, facts: await loadFacts(db, actorId, { kind: 'event', event }) };
}

/**
 * Facts for a resource owned by `ownerId` inside the event.
 */
export function ownedBy(access: EventAccess, ownerId: string): AccessFacts {
    return { ...access.facts, ownerId };
}
