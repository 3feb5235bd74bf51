/**
 * Media - Albums
 *
 * - POST   /api/media/events/{eventId}/albums  - Create `{ name }`
 * - GET    /api/media/events/{eventId}/albums  - List, oldest first
 * - DELETE /api/media/albums/{albumId}         - Creator or organizer; removes photos and comments
 *
 * @module content/media/albums
 */

import {
    assertCan,
    created,
    noContent,
    ownedBy,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { openAccessibleEvent, openAlbum } from './access';
import { toAlbumResponse } from './mapper';
import { createAlbumSchema } from './validation';

export async function createAlbum(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event } = await openAccessibleEvent(ctx, pathParam(ctx, 'eventId'));
    const { name } = parseBody(createAlbumSchema, ctx.request);

    const album = await storage.createAlbum(ctx.db, event.eventId, name, ctx.user.userId);

    ctx.audit.byUser('ALBUM_CREATED', ctx.user.userId, { eventId: event.eventId, albumId: album.albumId });

    return created(toAlbumResponse(album));
}

export async function listAlbums(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event } = await openAccessibleEvent(ctx, pathParam(ctx, 'eventId'));
    const albums = await storage.listAlbums(ctx.db, event.eventId);
    return success(albums.map(toAlbumResponse));
}

export async function deleteAlbum(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const opened = await openAlbum(ctx, pathParam(ctx, 'albumId'));
    assertCan(ownedBy(opened, opened.album.createdById), 'resource:modify');

    await storage.deleteAlbum(ctx.db, opened.album.albumId);

    ctx.audit.byUser('ALBUM_DELETED', ctx.user.userId, {
        eventId: opened.event.eventId,
        albumId: opened.album.albumId,
    });

    return noContent();
}
