/**
 * Social Events API - Base DynamoDB Schema Types
 *
 * Foundation interfaces for the Single Table Design.
 * All entity types extend BaseItem for a consistent key structure.
 *
 * Key Design:
 * - PK (Partition Key): Entity-specific prefix pattern (e.g., GROUP#<id>)
 * - SK (Sort Key): METADATA/PROFILE for the entity itself, <CHILD>#<id> for
 *   rows owned by it (memberships, organizers, messages, votes, tickets)
 * - GSI1: Parent collections (e.g., all albums of an event)
 * - GSI2: Catalog listings (all groups, all events)
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType =
    | 'USER'
    | 'EMAIL_MARKER'
    | 'GROUP'
    | 'GROUP_MEMBERSHIP'
    | 'EVENT'
    | 'EVENT_ORGANIZER'
    | 'EVENT_PARTICIPANT'
    | 'THREAD'
    | 'MESSAGE'
    | 'ALBUM'
    | 'PHOTO'
    | 'PHOTO_COMMENT'
    | 'POLL'
    | 'POLL_QUESTION'
    | 'POLL_OPTION'
    | 'POLL_OPTION_LABEL'
    | 'POLL_VOTE'
    | 'TICKET_TYPE'
    | 'TICKET'
    | 'SHOPPING_ITEM'
    | 'SHOPPING_NAME'
    | 'CARPOOL_OFFER';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items in the Single Table Design.
 */
export interface BaseItem {
    /** Partition Key - Entity-specific prefix pattern */
    PK: string;
    /** Sort Key */
    SK: string;
    /** GSI1 Partition Key - parent collection */
    GSI1PK?: string;
    /** GSI1 Sort Key - ordering inside the collection */
    GSI1SK?: string;
    /** GSI2 Partition Key - catalog listing */
    GSI2PK?: string;
    /** GSI2 Sort Key */
    GSI2SK?: string;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** ISO 8601 creation timestamp */
    createdAt: string;
    /** ISO 8601 last update timestamp */
    updatedAt: string;
}
