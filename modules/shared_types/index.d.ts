/**
 * Social Events API - Shared Type Definitions
 *
 * Central export for the DynamoDB entity types and the audit contract.
 *
 * Usage:
 * ```typescript
 * import type { EventItem, UserItem } from '../../shared_types';
 * ```
 */

export type { BaseItem, EntityType } from './base';
export type { UserItem, EmailMarkerItem } from './user';
export type { GroupItem, GroupMembershipItem, GroupRole, GroupType } from './group';
export type {
    EventItem,
    EventFeature,
    EventOrganizerItem,
    EventParticipantItem,
    ParticipantStatus,
} from './event';
export type { ThreadItem, ThreadContext, MessageItem } from './discussion';
export type { AlbumItem, PhotoItem, PhotoCommentItem } from './media';
export type {
    PollItem,
    PollQuestionItem,
    PollOptionItem,
    PollOptionLabelItem,
    PollVoteItem,
} from './poll';
export type { TicketTypeItem, TicketItem } from './ticket';
export type { ShoppingItem, ShoppingNameItem, CarpoolOfferItem } from './addon';
export type {
    AuditAction,
    AuditActor,
    AuditLogEntry,
    AuditLogger,
    StrictAuditLogEntry,
} from './audit';
