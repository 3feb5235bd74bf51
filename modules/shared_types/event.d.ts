/**
 * Social Events API - Event Entity Types
 *
 * Key Patterns:
 *   - Event:       PK=EVENT#<id>  SK=METADATA
 *                  GSI1PK=GROUP#<group_id>#EVENTS (group-scoped events only)
 *                  GSI2PK=EVENT   GSI2SK=<start_date>#<id>
 *   - Organizer:   PK=EVENT#<id>  SK=ORGANIZER#<user_id>
 *   - Participant: PK=EVENT#<id>  SK=PARTICIPANT#<user_id>
 */

import type { BaseItem } from './base';

/** Sub-resources that can be switched on per event */
export type EventFeature = 'polls' | 'ticketing' | 'shoppingList' | 'carpool';

export type ParticipantStatus = 'going' | 'interested' | 'declined';

// =============================================================================
// Event Entity
// =============================================================================

export interface EventItem extends BaseItem {
    PK: `EVENT#${string}`;
    SK: 'METADATA';
    GSI2PK: 'EVENT';
    GSI2SK: string;
    entityType: 'EVENT';

    eventId: string;
    name: string;
    description?: string;
    /** ISO 8601 */
    startDate: string;
    /** ISO 8601, strictly after startDate */
    endDate: string;
    location: string;
    coverPhoto?: string;
    isPrivate: boolean;
    groupId?: string;
    pollsEnabled: boolean;
    ticketingEnabled: boolean;
    shoppingListEnabled: boolean;
    carpoolEnabled: boolean;
    createdById: string;
    /** Number of organizer links (denormalized, guards the last organizer) */
    organizerCount: number;
}

// =============================================================================
// Organizer / Participant Join Records
// =============================================================================

export interface EventOrganizerItem extends BaseItem {
    PK: `EVENT#${string}`;
    SK: `ORGANIZER#${string}`;
    entityType: 'EVENT_ORGANIZER';

    eventId: string;
    userId: string;
}

export interface EventParticipantItem extends BaseItem {
    PK: `EVENT#${string}`;
    SK: `PARTICIPANT#${string}`;
    entityType: 'EVENT_PARTICIPANT';

    eventId: string;
    userId: string;
    status: ParticipantStatus;
}
