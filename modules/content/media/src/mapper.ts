/**
 * Media - Response Mapping
 *
 * @module content/media/mapper
 */

import type { AlbumItem, PhotoCommentItem, PhotoItem } from '../../../shared_types/media';

export interface AlbumResponse {
    id: string;
    eventId: string;
    name: string;
    createdById: string;
    createdAt: string;
}

export interface PhotoResponse {
    id: string;
    albumId: string;
    eventId: string;
    url: string;
    caption?: string;
    uploadedById: string;
    createdAt: string;
}

export interface CommentResponse {
    id: string;
    photoId: string;
    authorId: string;
    content: string;
    createdAt: string;
}

export function toAlbumResponse(album: AlbumItem): AlbumResponse {
    return {
        id: album.albumId,
        eventId: album.eventId,
        name: album.name,
        createdById: album.createdById,
        createdAt: album.createdAt,
    };
}

export function toPhotoResponse(photo: PhotoItem): PhotoResponse {
    return {
        id: photo.photoId,
        albumId: photo.albumId,
        eventId: photo.eventId,
        url: photo.url,
        caption: photo.caption,
        uploadedById: photo.uploadedById,
        createdAt: photo.createdAt,
    };
}

export function toCommentResponse(comment: PhotoCommentItem): CommentResponse {
    return {
        id: comment.commentId,
        photoId: comment.photoId,
        authorId: comment.authorId,
        content: comment.content,
        createdAt: comment.createdAt,
    };
}
