/**
 * Event & Participation - Response Mapping
 *
 * @module community/events/mapper
 */

import type {
    EventItem,
    EventOrganizerItem,
    EventParticipantItem,
    ParticipantStatus,
} from '../../../shared_types/event';

export interface EventResponse {
    id: string;
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
    createdById: string;
    createdAt: string;
    updatedAt: string;
}

export interface OrganizerResponse {
    eventId: string;
    userId: string;
    createdAt: string;
}

export interface ParticipantResponse {
    eventId: string;
    userId: string;
    status: ParticipantStatus;
    joinedAt: string;
    updatedAt: string;
}

export interface EventDetailResponse extends EventResponse {
    organizers: OrganizerResponse[];
    participants: ParticipantResponse[];
}

export function toEventResponse(event: EventItem): EventResponse {
    return {
        id: event.eventId,
        name: event.name,
        description: event.description,
        startDate: event.startDate,
        endDate: event.endDate,
        location: event.location,
        coverPhoto: event.coverPhoto,
        isPrivate: event.isPrivate,
        groupId: event.groupId,
        pollsEnabled: event.pollsEnabled,
        ticketingEnabled: event.ticketingEnabled,
        shoppingListEnabled: event.shoppingListEnabled,
        carpoolEnabled: event.carpoolEnabled,
        createdById: event.createdById,
        createdAt: event.createdAt,
        updatedAt: event.updatedAt,
    };
}

export function toOrganizerResponse(organizer: EventOrganizerItem): OrganizerResponse {
    return {
        eventId: organizer.eventId,
        userId: organizer.userId,
        createdAt: organizer.createdAt,
    };
}

export function toParticipantResponse(participant: EventParticipantItem): ParticipantResponse {
    return {
        eventId: participant.eventId,
        userId: participant.userId,
        status: participant.status,
        joinedAt: participant.createdAt,
        updatedAt: participant.updatedAt,
    };
}
