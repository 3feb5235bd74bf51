/**
 * Media - Photos
 *
 * - POST   /api/media/albums/{albumId}/photos  - Add `{ url, caption? }`
 * - GET    /api/media/albums/{albumId}/photos  - List, oldest first
 * - GET    /api/media/photos/{photoId}
 * - DELETE /api/media/photos/{photoId}         - Uploader or organizer; removes comments
 *
 * @module content/media/photos
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
import { openAlbum, openPhoto } from './access';
import { toPhotoResponse } from './mapper';
import { addPhotoSchema } from './validation';

export async function addPhoto(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { album } = await openAlbum(ctx, pathParam(ctx, 'albumId'));
    const input = parseBody(addPhotoSchema, ctx.request);

    const photo = await storage.addPhoto(ctx.db, album, input, ctx.user.userId);

    ctx.audit.byUser('PHOTO_ADDED', ctx.user.userId, { albumId: album.albumId, photoId: photo.photoId });

    return created(toPhotoResponse(photo));
}

export async function listPhotos(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { album } = await openAlbum(ctx, pathParam(ctx, 'albumId'));
    const photos = await storage.listPhotos(ctx.db, album.albumId);
    return success(photos.map(toPhotoResponse));
}

export async function getPhoto(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { photo } = await openPhoto(ctx, pathParam(ctx, 'photoId'));
    return success(toPhotoResponse(photo));
}

export async function deletePhoto(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const opened = await openPhoto(ctx, pathParam(ctx, 'photoId'));
    assertCan(ownedBy(opened, opened.photo.uploadedById), 'resource:modify');

    await storage.deletePhoto(ctx.db, opened.photo.photoId);

    ctx.audit.byUser('PHOTO_DELETED', ctx.user.userId, { photoId: opened.photo.photoId });

    return noContent();
}
