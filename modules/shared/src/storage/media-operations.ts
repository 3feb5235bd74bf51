/**
 * Social Events API - Media Storage Operations
 *
 * Key Patterns:
 *   - Album:   PK=ALBUM#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#ALBUMS
 *   - Photo:   PK=PHOTO#<id>  SK=METADATA  GSI1PK=ALBUM#<album_id>#PHOTOS
 *   - Comment: PK=PHOTO#<id>  SK=COMMENT#<comment_id>
 *
 * @module storage/media-operations
 */

import type { AlbumItem, PhotoCommentItem, PhotoItem } from '../../../shared_types/media';
import { KeyPrefixes } from '../constants';
import { NotFoundError } from '../errors';
import { isAlbumItem, isCommentItem, isPhotoItem } from '../type-guards';
import { getTyped, newId, queryIndexTyped, queryTyped, timestamp, toKey } from './common';
import { IndexKeys, Keys, sortKey } from './keys';
import { ConditionFailedError, type ItemKey, type TableGateway, type WriteOperation } from './types';

/**
 * Run a transaction whose first operation checks the parent row.
 */
async function transactUnderParent(
    db: TableGateway,
    operations: WriteOperation[],
    parent: string
): Promise<void> {
    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError && err.failedAt(0)) {
            throw NotFoundError.of(parent);
        }
        throw err;
    }
}

// =============================================================================
// Albums
// =============================================================================

export async function createAlbum(
    db: TableGateway,
    eventId: string,
    name: string,
    creatorId: string
): Promise<AlbumItem> {
    const now = timestamp();
    const albumId = newId();
    const album: AlbumItem = {
        ...Keys.album(albumId),
        GSI1PK: IndexKeys.eventAlbums(eventId),
        GSI1SK: sortKey(now, albumId),
        entityType: 'ALBUM',
        albumId,
        eventId,
        name,
        createdById: creatorId,
        createdAt: now,
        updatedAt: now,
    };

    await transactUnderParent(db, [
        { type: 'check', key: Keys.event(eventId), conditions: [{ kind: 'exists' }] },
        { type: 'put', item: album, conditions: [{ kind: 'notExists' }] },
    ], 'Event');

    return album;
}

export async function getAlbum(db: TableGateway, albumId: string): Promise<AlbumItem | null> {
    return getTyped(db, Keys.album(albumId), isAlbumItem);
}

export async function listAlbums(db: TableGateway, eventId: string): Promise<AlbumItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.eventAlbums(eventId), isAlbumItem);
}

/**
 * Keys of an album, its photos and their comments, album first.
 */
export async function collectAlbumKeys(db: TableGateway, albumId: string): Promise<ItemKey[]> {
    const photos = await listPhotos(db, albumId);
    const photoKeys = await Promise.all(photos.map((photo) => collectPhotoKeys(db, photo.photoId)));
    return [Keys.album(albumId), ...photoKeys.flat()];
}

/**
 * Delete an album with its photos and their comments.
 */
export async function deleteAlbum(db: TableGateway, albumId: string): Promise<void> {
    await db.deleteAll(await collectAlbumKeys(db, albumId));
}

// =============================================================================
// Photos
// =============================================================================

export interface NewPhoto {
    url: string;
    caption?: string;
}

export async function addPhoto(
    db: TableGateway,
    album: AlbumItem,
    input: NewPhoto,
    uploaderId: string
): Promise<PhotoItem> {
    const now = timestamp();
    const photoId = newId();
    const photo: PhotoItem = {
        ...Keys.photo(photoId),
        GSI1PK: IndexKeys.albumPhotos(album.albumId),
        GSI1SK: sortKey(now, photoId),
        entityType: 'PHOTO',
        photoId,
        albumId: album.albumId,
        eventId: album.eventId,
        url: input.url,
        ...(input.caption !== undefined && { caption: input.caption }),
        uploadedById: uploaderId,
        createdAt: now,
        updatedAt: now,
    };

    await transactUnderParent(db, [
        { type: 'check', key: Keys.album(album.albumId), conditions: [{ kind: 'exists' }] },
        { type: 'put', item: photo, conditions: [{ kind: 'notExists' }] },
    ], 'Album');

    return photo;
}

export async function getPhoto(db: TableGateway, photoId: string): Promise<PhotoItem | null> {
    return getTyped(db, Keys.photo(photoId), isPhotoItem);
}

export async function listPhotos(db: TableGateway, albumId: string): Promise<PhotoItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.albumPhotos(albumId), isPhotoItem);
}

/**
 * Keys of a photo and its comments, photo first.
 */
export async function collectPhotoKeys(db: TableGateway, photoId: string): Promise<ItemKey[]> {
    const comments = await db.query(`${KeyPrefixes.PHOTO}${photoId}`, KeyPrefixes.COMMENT);
    return [Keys.photo(photoId), ...comments.flatMap(toKey)];
}

export async function deletePhoto(db: TableGateway, photoId: string): Promise<void> {
    await db.deleteAll(await collectPhotoKeys(db, photoId));
}

// =============================================================================
// Comments
// =============================================================================

export async function addComment(
    db: TableGateway,
    photo: PhotoItem,
    content: string,
    authorId: string
): Promise<PhotoCommentItem> {
    const now = timestamp();
    const commentId = newId();
    const comment: PhotoCommentItem = {
        ...Keys.comment(photo.photoId, commentId),
        entityType: 'PHOTO_COMMENT',
        commentId,
        photoId: photo.photoId,
        eventId: photo.eventId,
        authorId,
        content,
        createdAt: now,
        updatedAt: now,
    };

    await transactUnderParent(db, [
        { type: 'check', key: Keys.photo(photo.photoId), conditions: [{ kind: 'exists' }] },
        { type: 'put', item: comment, conditions: [{ kind: 'notExists' }] },
    ], 'Photo');

    return comment;
}

export async function getComment(
    db: TableGateway,
    photoId: string,
    commentId: string
): Promise<PhotoCommentItem | null> {
    return getTyped(db, Keys.comment(photoId, commentId), isCommentItem);
}

/**
 * Comments of a photo, oldest first.
 */
export async function listComments(db: TableGateway, photoId: string): Promise<PhotoCommentItem[]> {
    const comments = await queryTyped(db, `${KeyPrefixes.PHOTO}${photoId}`, KeyPrefixes.COMMENT, isCommentItem);
    return comments.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

export async function deleteComment(db: TableGateway, photoId: string, commentId: string): Promise<void> {
    try {
        await db.transact([
            { type: 'delete', key: Keys.comment(photoId, commentId), conditions: [{ kind: 'exists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Comment');
        }
        throw err;
    }
}
