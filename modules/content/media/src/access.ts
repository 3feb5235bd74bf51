/**
 * Media - Resource Access
 *
 * Albums, photos and comments are visible to anyone with access to the
 * event they belong to. Deleting one is reserved for its creator and the
 * event's organizers.
 *
 * @module content/media/access
 */

import {
    NotFoundError,
    assertCan,
    openEvent,
    storage,
    type AuthenticatedContext,
    type EventAccess,
} from '@social-api/shared';
import type { AlbumItem, PhotoItem } from '../../../shared_types/media';

export interface OpenedAlbum extends EventAccess {
    album: AlbumItem;
}

export interface OpenedPhoto extends EventAccess {
    photo: PhotoItem;
}

/**
 * Load an event the caller has access to.
 *
 * @throws NotFoundError if the event does not exist
 * @throws ForbiddenError if the caller has no access to it
 */
export async function openAccessibleEvent(ctx: AuthenticatedContext, eventId: string): Promise<EventAccess> {
    const access = await openEvent(ctx.db, ctx.user.userId, eventId);
    assertCan(access.facts, 'event:access');
    return access;
}

export async function openAlbum(ctx: AuthenticatedContext, albumId: string): Promise<OpenedAlbum> {
    const album = await storage.getAlbum(ctx.db, albumId);
    if (!album) {
        throw NotFoundError.of('Album');
    }
    return { album, ...(await openAccessibleEvent(ctx, album.eventId)) };
}

export async function openPhoto(ctx: AuthenticatedContext, photoId: string): Promise<OpenedPhoto> {
    const photo = await storage.getPhoto(ctx.db, photoId);
    if (!photo) {
        throw NotFoundError.of('Photo');
    }
    return { photo, ...(await openAccessibleEvent(ctx, photo.eventId)) };
}
