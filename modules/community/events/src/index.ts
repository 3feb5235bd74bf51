/**
 * Event & Participation - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/events
 * - GET    /api/events
 * - GET    /api/events/{eventId}
 * - PATCH  /api/events/{eventId}
 * - DELETE /api/events/{eventId}
 * - POST   /api/events/{eventId}/organizers
 * - DELETE /api/events/{eventId}/organizers/{userId}
 * - POST   /api/events/{eventId}/participants
 * - PATCH  /api/events/{eventId}/participants/{userId}
 * - DELETE /api/events/{eventId}/participants/{userId}
 *
 * DynamoDB Key Patterns:
 * - Event:       PK=EVENT#<id>  SK=METADATA  GSI2PK=EVENT  GSI2SK=<start>#<id>
 * - Organizer:   PK=EVENT#<id>  SK=ORGANIZER#<user_id>
 * - Participant: PK=EVENT#<id>  SK=PARTICIPANT#<user_id>
 *
 * @module community/events
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { createEvent, deleteEvent, getEvent, listEvents, updateEvent } from './events';
import { addOrganizer, removeOrganizer } from './organizers';
import { addParticipant, removeParticipant, updateParticipant } from './participants';

export const handler = createHandler('events', {
    'POST /api/events': authenticatedRoute(createEvent),
    'GET /api/events': authenticatedRoute(listEvents),
    'GET /api/events/{eventId}': authenticatedRoute(getEvent),
    'PATCH /api/events/{eventId}': authenticatedRoute(updateEvent),
    'DELETE /api/events/{eventId}': authenticatedRoute(deleteEvent),
    'POST /api/events/{eventId}/organizers': authenticatedRoute(addOrganizer),
    'DELETE /api/events/{eventId}/organizers/{userId}': authenticatedRoute(removeOrganizer),
    'POST /api/events/{eventId}/participants': authenticatedRoute(addParticipant),
    'PATCH /api/events/{eventId}/participants/{userId}': authenticatedRoute(updateParticipant),
    'DELETE /api/events/{eventId}/participants/{userId}': authenticatedRoute(removeParticipant),
});
