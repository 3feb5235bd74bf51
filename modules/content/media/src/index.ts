/**
 * Media - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/media/events/{eventId}/albums
 * - GET    /api/media/events/{eventId}/albums
 * - DELETE /api/media/albums/{albumId}
 * - POST   /api/media/albums/{albumId}/photos
 * - GET    /api/media/albums/{albumId}/photos
 * - GET    /api/media/photos/{photoId}
 * - DELETE /api/media/photos/{photoId}
 * - POST   /api/media/photos/{photoId}/comments
 * - GET    /api/media/photos/{photoId}/comments
 * - DELETE /api/media/comments/{photoId}/{commentId}
 *
 * DynamoDB Key Patterns:
 * - Album:   PK=ALBUM#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#ALBUMS
 * - Photo:   PK=PHOTO#<id>  SK=METADATA  GSI1PK=ALBUM#<album_id>#PHOTOS
 * - Comment: PK=PHOTO#<id>  SK=COMMENT#<comment_id>
 *
 * @module content/media
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { createAlbum, deleteAlbum, listAlbums } from './albums';
import { addComment, deleteComment, listComments } from './comments';
import { addPhoto, deletePhoto, getPhoto, listPhotos } from './photos';

export const handler = createHandler('media', {
    'POST /api/media/events/{eventId}/albums': authenticatedRoute(createAlbum),
    'GET /api/media/events/{eventId}/albums': authenticatedRoute(listAlbums),
    'DELETE /api/media/albums/{albumId}': authenticatedRoute(deleteAlbum),
    'POST /api/media/albums/{albumId}/photos': authenticatedRoute(addPhoto),
    'GET /api/media/albums/{albumId}/photos': authenticatedRoute(listPhotos),
    'GET /api/media/photos/{photoId}': authenticatedRoute(getPhoto),
    'DELETE /api/media/photos/{photoId}': authenticatedRoute(deletePhoto),
    'POST /api/media/photos/{photoId}/comments': authenticatedRoute(addComment),
    'GET /api/media/photos/{photoId}/comments': authenticatedRoute(listComments),
    'DELETE /api/media/comments/{photoId}/{commentId}': authenticatedRoute(deleteComment),
});
