/**
 * Media - Request Schemas
 *
 * @module content/media/validation
 */

import { z } from 'zod';
import { FieldLimits, nameSchema, urlSchema } from '@social-api/shared';

export const createAlbumSchema = z.object({
    name: nameSchema,
});

export const addPhotoSchema = z.object({
    url: urlSchema,
    caption: z.string().trim().max(FieldLimits.DESCRIPTION_MAX).optional(),
});

export const addCommentSchema = z.object({
    content: z.string().trim().min(1).max(FieldLimits.COMMENT_MAX),
});
