/**
 * Carpooling - Offers
 *
 * - POST   /api/carpool/events/{eventId}/offers  - Offer a ride
 * - GET    /api/carpool/events/{eventId}/offers  - Ordered by departure time
 * - PATCH  /api/carpool/offers/{offerId}         - Driver or organizer
 * - DELETE /api/carpool/offers/{offerId}         - Driver or organizer
 *
 * @module addons/carpool/offers
 */

import {
    NotFoundError,
    assertCan,
    created,
    noContent,
    openEvent,
    ownedBy,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
    type EventAccess,
} from '@social-api/shared';
import type { CarpoolOfferItem } from '../../../shared_types/addon';
import { createOfferSchema, updateOfferSchema } from './validation';

export interface CarpoolOfferResponse {
    id: string;
    eventId: string;
    driverId: string;
    departureLocation: string;
    departureTime: string;
    price: number;
    availableSeats: number;
    maxDetourMinutes: number;
    createdAt: string;
}

export function toOfferResponse(offer: CarpoolOfferItem): CarpoolOfferResponse {
    return {
        id: offer.offerId,
        eventId: offer.eventId,
        driverId: offer.driverId,
        departureLocation: offer.departureLocation,
        departureTime: offer.departureTime,
        price: offer.price,
        availableSeats: offer.availableSeats,
        maxDetourMinutes: offer.maxDetourMinutes,
        createdAt: offer.createdAt,
    };
}

async function openEventWithAccess(ctx: AuthenticatedContext, eventId: string): Promise<EventAccess> {
    const access = await openEvent(ctx.db, ctx.user.userId, eventId);
    assertCan(access.facts, 'event:access');
    return access;
}

async function openOwnOffer(ctx: AuthenticatedContext): Promise<CarpoolOfferItem> {
    const offer = await storage.getCarpoolOffer(ctx.db, pathParam(ctx, 'offerId'));
    if (!offer) {
        throw NotFoundError.of('Carpool offer');
    }
    const access = await openEventWithAccess(ctx, offer.eventId);
    assertCan(ownedBy(access, offer.driverId), 'resource:modify');
    return offer;
}

export async function createOffer(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event } = await openEventWithAccess(ctx, pathParam(ctx, 'eventId'));
    const input = parseBody(createOfferSchema, ctx.request);

    const offer = await storage.createCarpoolOffer(ctx.db, event.eventId, input, ctx.user.userId);

    ctx.audit.byUser('CARPOOL_OFFER_CREATED', ctx.user.userId, { eventId: event.eventId, offerId: offer.offerId });

    return created(toOfferResponse(offer));
}

export async function listOffers(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event } = await openEventWithAccess(ctx, pathParam(ctx, 'eventId'));
    const offers = await storage.listCarpoolOffers(ctx.db, event.eventId);
    return success(offers.map(toOfferResponse));
}

export async function updateOffer(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const current = await openOwnOffer(ctx);
    const changes = parseBody(updateOfferSchema, ctx.request);

    const offer = await storage.updateCarpoolOffer(ctx.db, current, changes);

    ctx.audit.byUser('CARPOOL_OFFER_UPDATED', ctx.user.userId, { offerId: offer.offerId, fields: Object.keys(changes) });

    return success(toOfferResponse(offer));
}

export async function deleteOffer(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const offer = await openOwnOffer(ctx);

    await storage.deleteCarpoolOffer(ctx.db, offer.offerId);

    ctx.audit.byUser('CARPOOL_OFFER_DELETED', ctx.user.userId, { offerId: offer.offerId });

    return noContent();
}
