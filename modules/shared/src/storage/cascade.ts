/**
 * Social Events API - Cascading Deletes
 *
 * Collects the keys of an event or a group and everything that hangs off
 * it. The parent key is always listed first: when the set spans several
 * transactions the parent disappears in the first one, and every read
 * resolves its parent before its children.
 *
 * @module storage/cascade
 */

import { KeyPrefixes, MetadataSortKeys } from '../constants';
import { toKey } from './common';
import { collectThreadKeys, listThreads } from './discussion-operations';
import { listGroupEvents } from './event-operations';
import { collectAlbumKeys, listAlbums } from './media-operations';
import { collectPollKeys, listPolls } from './poll-operations';
import { collectTicketTypeKeys, listTicketTypes } from './ticket-operations';
import { listCarpoolOffers, listShoppingItems } from './addon-operations';
import { Keys } from './keys';
import type { ItemKey, StoredItem, TableGateway } from './types';

function childKeys(rows: StoredItem[]): ItemKey[] {
    return rows.filter((row) => row.SK !== MetadataSortKeys.METADATA).flatMap(toKey);
}

/**
 * Keys of an event with its organizers, participants, threads, albums,
 * polls, ticket types and add-on rows. Shopping name markers live in the
 * event partition.
 */
export async function collectEventKeys(db: TableGateway, eventId: string): Promise<ItemKey[]> {
    const [partition, threads, albums, polls, ticketTypes, shoppingItems, offers] = await Promise.all([
        db.query(`${KeyPrefixes.EVENT}${eventId}`),
        listThreads(db, { context: 'event', eventId }),
        listAlbums(db, eventId),
        listPolls(db, eventId),
        listTicketTypes(db, eventId),
        listShoppingItems(db, eventId),
        listCarpoolOffers(db, eventId),
    ]);

    const nested = await Promise.all([
        ...threads.map((thread) => collectThreadKeys(db, thread.threadId)),
        ...albums.map((album) => collectAlbumKeys(db, album.albumId)),
        ...polls.map((poll) => collectPollKeys(db, poll.pollId)),
        ...ticketTypes.map((ticketType) => collectTicketTypeKeys(db, ticketType.ticketTypeId)),
    ]);

    return [
        Keys.event(eventId),
        ...childKeys(partition),
        ...nested.flat(),
        ...shoppingItems.map((item) => Keys.shoppingItem(item.itemId)),
        ...offers.map((offer) => Keys.carpoolOffer(offer.offerId)),
    ];
}

/**
 * Keys of a group with its memberships, threads and events.
 */
export async function collectGroupKeys(db: TableGateway, groupId: string): Promise<ItemKey[]> {
    const [partition, threads, events] = await Promise.all([
        db.query(`${KeyPrefixes.GROUP}${groupId}`),
        listThreads(db, { context: 'group', groupId }),
        listGroupEvents(db, groupId),
    ]);

    const nested = await Promise.all([
        ...threads.map((thread) => collectThreadKeys(db, thread.threadId)),
        ...events.map((event) => collectEventKeys(db, event.eventId)),
    ]);

    return [Keys.group(groupId), ...childKeys(partition), ...nested.flat()];
}

export async function deleteEventCascade(db: TableGateway, eventId: string): Promise<void> {
    await db.deleteAll(await collectEventKeys(db, eventId));
}

export async function deleteGroupCascade(db: TableGateway, groupId: string): Promise<void> {
    await db.deleteAll(await collectGroupKeys(db, groupId));
}
