/**
 * Media - Photo Comments
 *
 * - POST   /api/media/photos/{photoId}/comments         - `{ content }`
 * - GET    /api/media/photos/{photoId}/comments         - Oldest first
 * - DELETE /api/media/comments/{photoId}/{commentId}    - Author or organizer
 *
 * @module content/media/comments
 */

import {
    NotFoundError,
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
import { openPhoto } from './access';
import { toCommentResponse } from './mapper';
import { addCommentSchema } from './validation';

export async function addComment(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { photo } = await openPhoto(ctx, pathParam(ctx, 'photoId'));
    const { content } = parseBody(addCommentSchema, ctx.request);

    const comment = await storage.addComment(ctx.db, photo, content, ctx.user.userId);

    ctx.audit.byUser('COMMENT_ADDED', ctx.user.userId, { photoId: photo.photoId, commentId: comment.commentId });

    return created(toCommentResponse(comment));
}

export async function listComments(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { photo } = await openPhoto(ctx, pathParam(ctx, 'photoId'));
    const comments = await storage.listComments(ctx.db, photo.photoId);
    return success(comments.map(toCommentResponse));
}

export async function deleteComment(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const opened = await openPhoto(ctx, pathParam(ctx, 'photoId'));
    const comment = await storage.getComment(ctx.db, opened.photo.photoId, pathParam(ctx, 'commentId'));
    if (!comment) {
        throw NotFoundError.of('Comment');
    }
    assertCan(ownedBy(opened, comment.authorId), 'resource:modify');

    await storage.deleteComment(ctx.db, comment.photoId, comment.commentId);

    ctx.audit.byUser('COMMENT_DELETED', ctx.user.userId, { photoId: comment.photoId, commentId: comment.commentId });

    return noContent();
}
