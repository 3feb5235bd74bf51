/**
 * Group & Membership - Request Schemas
 *
 * @module community/groups/validation
 */

import { z } from 'zod';
import {
    FieldLimits,
    GroupRoles,
    GroupTypes,
    descriptionSchema,
    idSchema,
    nameSchema,
    nonEmptyPatch,
} from '@social-api/shared';

const groupTypeSchema = z.enum([GroupTypes.PUBLIC, GroupTypes.PRIVATE, GroupTypes.SECRET]);

const groupRoleSchema = z.enum([GroupRoles.MEMBER, GroupRoles.EVENT_CREATOR, GroupRoles.ADMIN]);

const imageRefSchema = z.string().trim().min(1).max(FieldLimits.URL_MAX);

export const createGroupSchema = z
    .object({
        name: nameSchema,
        description: descriptionSchema.optional(),
        icon: imageRefSchema.optional(),
        coverPhoto: imageRefSchema.optional(),
        type: groupTypeSchema,
        allowMemberPosts: z.boolean().default(true),
        allowMemberEvents: z.boolean().default(false),
    })
    .strict();

/** `null` clears an optional field */
export const updateGroupSchema = nonEmptyPatch({
    name: nameSchema.optional(),
    description: descriptionSchema.nullable().optional(),
    icon: imageRefSchema.nullable().optional(),
    coverPhoto: imageRefSchema.nullable().optional(),
    type: groupTypeSchema.optional(),
    allowMemberPosts: z.boolean().optional(),
    allowMemberEvents: z.boolean().optional(),
});

export const addMemberSchema = z
    .object({
        userId: idSchema,
        role: groupRoleSchema.default(GroupRoles.MEMBER),
    })
    .strict();

export const updateMemberSchema = z
    .object({
        role: groupRoleSchema,
    })
    .strict();
