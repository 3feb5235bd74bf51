/**
 * Carpooling - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/carpool/events/{eventId}/offers
 * - GET    /api/carpool/events/{eventId}/offers
 * - PATCH  /api/carpool/offers/{offerId}
 * - DELETE /api/carpool/offers/{offerId}
 *
 * DynamoDB Key Patterns:
 * - Offer: PK=CARPOOL_OFFER#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#CARPOOL_OFFERS
 *          GSI1SK=<departure_time>#<id>
 *
 * @module addons/carpool
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { createOffer, deleteOffer, listOffers, updateOffer } from './offers';

export const handler = createHandler('carpool', {
    'POST /api/carpool/events/{eventId}/offers': authenticatedRoute(createOffer),
    'GET /api/carpool/events/{eventId}/offers': authenticatedRoute(listOffers),
    'PATCH /api/carpool/offers/{offerId}': authenticatedRoute(updateOffer),
    'DELETE /api/carpool/offers/{offerId}': authenticatedRoute(deleteOffer),
});
