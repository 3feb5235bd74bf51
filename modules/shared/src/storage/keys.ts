/**
 * Social Events API - Key Builders
 *
 * Every PK/SK/GSI key of the table is built here so that the layout lives
 * in one place.
 *
 * @module storage/keys
 */

import { CatalogKeys, KeyPrefixes, MetadataSortKeys } from '../constants';

export const Keys = {
    user: (userId: string) => ({ PK: `${KeyPrefixes.USER}${userId}`, SK: MetadataSortKeys.PROFILE }) as const,
    email: (email: string) => ({ PK: `${KeyPrefixes.EMAIL}${email}`, SK: MetadataSortKeys.EMAIL_USER }) as const,

    group: (groupId: string) => ({ PK: `${KeyPrefixes.GROUP}${groupId}`, SK: MetadataSortKeys.METADATA }) as const,
    membership: (groupId: string, userId: string) =>
        ({ PK: `${KeyPrefixes.GROUP}${groupId}`, SK: `${KeyPrefixes.MEMBER}${userId}` }) as const,

    event: (eventId: string) => ({ PK: `${KeyPrefixes.EVENT}${eventId}`, SK: MetadataSortKeys.METADATA }) as const,
    organizer: (eventId: string, userId: string) =>
        ({ PK: `${KeyPrefixes.EVENT}${eventId}`, SK: `${KeyPrefixes.ORGANIZER}${userId}` }) as const,
    participant: (eventId: string, userId: string) =>
        ({ PK: `${KeyPrefixes.EVENT}${eventId}`, SK: `${KeyPrefixes.PARTICIPANT}${userId}` }) as const,

    thread: (threadId: string) => ({ PK: `${KeyPrefixes.THREAD}${threadId}`, SK: MetadataSortKeys.METADATA }) as const,
    message: (threadId: string, messageId: string) =>
        ({ PK: `${KeyPrefixes.THREAD}${threadId}`, SK: `${KeyPrefixes.MESSAGE}${messageId}` }) as const,

    album: (albumId: string) => ({ PK: `${KeyPrefixes.ALBUM}${albumId}`, SK: MetadataSortKeys.METADATA }) as const,
    photo: (photoId: string) => ({ PK: `${KeyPrefixes.PHOTO}${photoId}`, SK: MetadataSortKeys.METADATA }) as const,
    comment: (photoId: string, commentId: string) =>
        ({ PK: `${KeyPrefixes.PHOTO}${photoId}`, SK: `${KeyPrefixes.COMMENT}${commentId}` }) as const,

    poll: (pollId: string) => ({ PK: `${KeyPrefixes.POLL}${pollId}`, SK: MetadataSortKeys.METADATA }) as const,
    question: (pollId: string, questionId: string) =>
        ({ PK: `${KeyPrefixes.POLL}${pollId}`, SK: `${KeyPrefixes.QUESTION}${questionId}` }) as const,
    option: (pollId: string, questionId: string, optionId: string) =>
        ({ PK: `${KeyPrefixes.POLL}${pollId}`, SK: `${KeyPrefixes.OPTION}${questionId}#${optionId}` }) as const,
    optionLabel: (pollId: string, questionId: string, label: string) =>
        ({
            PK: `${KeyPrefixes.POLL}${pollId}`,
            SK: `${KeyPrefixes.OPTION_LABEL}${questionId}#${label.trim().toLowerCase()}`,
        }) as const,
    vote: (pollId: string, questionId: string, userId: string) =>
        ({ PK: `${KeyPrefixes.POLL}${pollId}`, SK: `${KeyPrefixes.VOTE}${questionId}#${userId}` }) as const,

    ticketType: (ticketTypeId: string) =>
        ({ PK: `${KeyPrefixes.TICKET_TYPE}${ticketTypeId}`, SK: MetadataSortKeys.METADATA }) as const,
    ticket: (ticketTypeId: string, email: string) =>
        ({ PK: `${KeyPrefixes.TICKET_TYPE}${ticketTypeId}`, SK: `${KeyPrefixes.TICKET}${email}` }) as const,

    shoppingItem: (itemId: string) =>
        ({ PK: `${KeyPrefixes.SHOPPING_ITEM}${itemId}`, SK: MetadataSortKeys.METADATA }) as const,
    shoppingName: (eventId: string, name: string) =>
        ({
            PK: `${KeyPrefixes.EVENT}${eventId}`,
            SK: `${KeyPrefixes.SHOPPING_NAME}${name.trim().toLowerCase()}`,
        }) as const,

    carpoolOffer: (offerId: string) =>
        ({ PK: `${KeyPrefixes.CARPOOL_OFFER}${offerId}`, SK: MetadataSortKeys.METADATA }) as const,
};

/**
 * GSI partition keys for parent collections and catalogs.
 */
export const IndexKeys = {
    groupCatalog: CatalogKeys.GROUP,
    eventCatalog: CatalogKeys.EVENT,
    userGroups: (userId: string) => `${KeyPrefixes.USER}${userId}#GROUPS` as const,
    groupEvents: (groupId: string) => `${KeyPrefixes.GROUP}${groupId}#EVENTS`,
    groupThreads: (groupId: string) => `${KeyPrefixes.GROUP}${groupId}#THREADS`,
    eventThreads: (eventId: string) => `${KeyPrefixes.EVENT}${eventId}#THREADS`,
    eventAlbums: (eventId: string) => `${KeyPrefixes.EVENT}${eventId}#ALBUMS`,
    albumPhotos: (albumId: string) => `${KeyPrefixes.ALBUM}${albumId}#PHOTOS`,
    eventPolls: (eventId: string) => `${KeyPrefixes.EVENT}${eventId}#POLLS`,
    eventTicketTypes: (eventId: string) => `${KeyPrefixes.EVENT}${eventId}#TICKET_TYPES`,
    eventShoppingItems: (eventId: string) => `${KeyPrefixes.EVENT}${eventId}#SHOPPING_ITEMS`,
    eventCarpoolOffers: (eventId: string) => `${KeyPrefixes.EVENT}${eventId}#CARPOOL_OFFERS`,
};

/** ISO 8601 timestamp plus id, sorts chronologically and stays unique */
export function sortKey(timestamp: string, id: string): string {
    return `${timestamp}#${id}`;
}
