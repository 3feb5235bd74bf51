/**
 * Social Events API - Validation Module
 *
 * @module validation
 */

export { isValidEmail, normalizeEmail, emailSchema } from './email';

export {
    validate,
    readJson,
    readForm,
    parseBody,
    nameSchema,
    descriptionSchema,
    urlSchema,
    dateTimeSchema,
    idSchema,
    nonEmptyPatch,
} from './schema';

export type { BodySource } from './schema';
