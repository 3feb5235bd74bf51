/**
 * Social Events API - Type Guards
 *
 * Runtime type guards for DynamoDB entity discrimination.
 * These provide safe type narrowing for Single Table Design entities.
 *
 * Each guard validates:
 * - entityType discriminator matches expected value
 * - PK prefix matches expected pattern
 * - SK value (or SK prefix for child rows) matches the entity type
 *
 * Usage:
 * ```typescript
 * const item = await db.get(Keys.event(eventId));
 * if (isEventItem(item)) {
 *   // TypeScript knows item is EventItem here
 *   console.log(item.startDate);
 * }
 * ```
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import type { EntityType } from '../../shared_types/base';
import type { UserItem } from '../../shared_types/user';
import type { GroupItem, GroupMembershipItem } from '../../shared_types/group';
import type { EventItem, EventOrganizerItem, EventParticipantItem } from '../../shared_types/event';
import type { MessageItem, ThreadItem } from '../../shared_types/discussion';
import type { AlbumItem, PhotoCommentItem, PhotoItem } from '../../shared_types/media';
import type {
    PollItem,
    PollOptionItem,
    PollQuestionItem,
    PollVoteItem,
} from '../../shared_types/poll';
import type { TicketItem, TicketTypeItem } from '../../shared_types/ticket';
import type { CarpoolOfferItem, ShoppingItem } from '../../shared_types/addon';
import { KeyPrefixes, MetadataSortKeys } from './constants';

// =============================================================================
// Matching Helper
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * @param sk - exact SK, or an SK prefix when `skIsPrefix` is set
 */
function matches(
    item: unknown,
    entityType: EntityType,
    pkPrefix: string,
    sk: string,
    skIsPrefix = false
): boolean {
    if (!isRecord(item)) {
        return false;
    }
    const { PK, SK } = item;
    return (
        item.entityType === entityType &&
        typeof PK === 'string' &&
        PK.startsWith(pkPrefix) &&
        typeof SK === 'string' &&
        (skIsPrefix ? SK.startsWith(sk) : SK === sk)
    );
}

// =============================================================================
// Identity and Groups
// =============================================================================

/** Key Pattern: PK=USER#<id>, SK=PROFILE */
export function isUserItem(item: unknown): item is UserItem {
    return matches(item, 'USER', KeyPrefixes.USER, MetadataSortKeys.PROFILE);
}

/** Key Pattern: PK=GROUP#<id>, SK=METADATA */
export function isGroupItem(item: unknown): item is GroupItem {
    return matches(item, 'GROUP', KeyPrefixes.GROUP, MetadataSortKeys.METADATA);
}

/** Key Pattern: PK=GROUP#<id>, SK=MEMBER#<user_id> */
export function isMembershipItem(item: unknown): item is GroupMembershipItem {
    return matches(item, 'GROUP_MEMBERSHIP', KeyPrefixes.GROUP, KeyPrefixes.MEMBER, true);
}

// =============================================================================
// Events
// =============================================================================

/** Key Pattern: PK=EVENT#<id>, SK=METADATA */
export function isEventItem(item: unknown): item is EventItem {
    return matches(item, 'EVENT', KeyPrefixes.EVENT, MetadataSortKeys.METADATA);
}

/** Key Pattern: PK=EVENT#<id>, SK=ORGANIZER#<user_id> */
export function isOrganizerItem(item: unknown): item is EventOrganizerItem {
    return matches(item, 'EVENT_ORGANIZER', KeyPrefixes.EVENT, KeyPrefixes.ORGANIZER, true);
}

/** Key Pattern: PK=EVENT#<id>, SK=PARTICIPANT#<user_id> */
export function isParticipantItem(item: unknown): item is EventParticipantItem {
    return matches(item, 'EVENT_PARTICIPANT', KeyPrefixes.EVENT, KeyPrefixes.PARTICIPANT, true);
}

// =============================================================================
// Discussions
// =============================================================================

export function isThreadItem(item: unknown): item is ThreadItem {
    return matches(item, 'THREAD', KeyPrefixes.THREAD, MetadataSortKeys.METADATA);
}

export function isMessageItem(item: unknown): item is MessageItem {
    return matches(item, 'MESSAGE', KeyPrefixes.THREAD, KeyPrefixes.MESSAGE, true);
}

// =============================================================================
// Media
// =============================================================================

export function isAlbumItem(item: unknown): item is AlbumItem {
    return matches(item, 'ALBUM', KeyPrefixes.ALBUM, MetadataSortKeys.METADATA);
}

export function isPhotoItem(item: unknown): item is PhotoItem {
    return matches(item, 'PHOTO', KeyPrefixes.PHOTO, MetadataSortKeys.METADATA);
}

export function isCommentItem(item: unknown): item is PhotoCommentItem {
    return matches(item, 'PHOTO_COMMENT', KeyPrefixes.PHOTO, KeyPrefixes.COMMENT, true);
}

// =============================================================================
// Polls
// =============================================================================

export function isPollItem(item: unknown): item is PollItem {
    return matches(item, 'POLL', KeyPrefixes.POLL, MetadataSortKeys.METADATA);
}

export function isQuestionItem(item: unknown): item is PollQuestionItem {
    return matches(item, 'POLL_QUESTION', KeyPrefixes.POLL, KeyPrefixes.QUESTION, true);
}

export function isOptionItem(item: unknown): item is PollOptionItem {
    return matches(item, 'POLL_OPTION', KeyPrefixes.POLL, KeyPrefixes.OPTION, true);
}

export function isVoteItem(item: unknown): item is PollVoteItem {
    return matches(item, 'POLL_VOTE', KeyPrefixes.POLL, KeyPrefixes.VOTE, true);
}

// =============================================================================
// Ticketing
// =============================================================================

export function isTicketTypeItem(item: unknown): item is TicketTypeItem {
    return matches(item, 'TICKET_TYPE', KeyPrefixes.TICKET_TYPE, MetadataSortKeys.METADATA);
}

export function isTicketItem(item: unknown): item is TicketItem {
    return matches(item, 'TICKET', KeyPrefixes.TICKET_TYPE, KeyPrefixes.TICKET, true);
}

// =============================================================================
// Add-ons
// =============================================================================

export function isShoppingItem(item: unknown): item is ShoppingItem {
    return matches(item, 'SHOPPING_ITEM', KeyPrefixes.SHOPPING_ITEM, MetadataSortKeys.METADATA);
}

export function isCarpoolOfferItem(item: unknown): item is CarpoolOfferItem {
    return matches(item, 'CARPOOL_OFFER', KeyPrefixes.CARPOOL_OFFER, MetadataSortKeys.METADATA);
}
