/**
 * Social Events API - Media Entity Types
 *
 * Key Patterns:
 *   - Album:   PK=ALBUM#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#ALBUMS
 *   - Photo:   PK=PHOTO#<id>  SK=METADATA  GSI1PK=ALBUM#<album_id>#PHOTOS
 *   - Comment: PK=PHOTO#<id>  SK=COMMENT#<comment_id>
 */

import type { BaseItem } from './base';

export interface AlbumItem extends BaseItem {
    PK: `ALBUM#${string}`;
    SK: 'METADATA';
    GSI1PK: string;
    GSI1SK: string;
    entityType: 'ALBUM';

    albumId: string;
    eventId: string;
    name: string;
    createdById: string;
}

export interface PhotoItem extends BaseItem {
    PK: `PHOTO#${string}`;
    SK: 'METADATA';
    GSI1PK: string;
    GSI1SK: string;
    entityType: 'PHOTO';

    photoId: string;
    albumId: string;
    eventId: string;
    url: string;
    caption?: string;
    uploadedById: string;
}

export interface PhotoCommentItem extends BaseItem {
    PK: `PHOTO#${string}`;
    SK: `COMMENT#${string}`;
    entityType: 'PHOTO_COMMENT';

    commentId: string;
    photoId: string;
    eventId: string;
    authorId: string;
    content: string;
}
