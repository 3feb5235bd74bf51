/**
 * Social Events API - Storage Port
 *
 * The TableGateway interface is the only seam between the business logic
 * and DynamoDB. Writes are expressed as structured operations so that the
 * same transaction can be applied by DynamoDB or by an in-process table in
 * tests.
 *
 * @module storage/types
 */

// =============================================================================
// Keys and Items
// =============================================================================

export interface ItemKey {
    PK: string;
    SK: string;
}

/** Raw item as read from the table, narrowed with the type guards */
export type StoredItem = Record<string, unknown>;

export type IndexName = 'GSI1' | 'GSI2';

// =============================================================================
// Conditions
// =============================================================================

/**
 * Condition attached to a write. All conditions of one operation must hold.
 */
export type WriteCondition =
    /** The addressed item exists */
    | { kind: 'exists' }
    /** The addressed item does not exist */
    | { kind: 'notExists' }
    /** Numeric attribute is strictly below another attribute of the same item */
    | { kind: 'lessThanAttribute'; attribute: string; limitAttribute: string }
    /** Numeric attribute is at most `value` */
    | { kind: 'atMost'; attribute: string; value: number }
    /** Numeric attribute is strictly greater than `value` */
    | { kind: 'greaterThan'; attribute: string; value: number }
    /** Attribute equals `value` */
    | { kind: 'equals'; attribute: string; value: string | number | boolean };

// =============================================================================
// Write Operations
// =============================================================================

export interface PutOperation {
    type: 'put';
    item: ItemKey;
    conditions?: WriteCondition[];
}

export interface UpdateOperation {
    type: 'update';
    key: ItemKey;
    /** Attributes to overwrite */
    set?: Record<string, unknown>;
    /** Attributes to remove */
    remove?: string[];
    /** Numeric attributes to increment (negative to decrement), missing counts as 0 */
    increment?: Record<string, number>;
    conditions?: WriteCondition[];
}

export interface DeleteOperation {
    type: 'delete';
    key: ItemKey;
    conditions?: WriteCondition[];
}

/** Asserts conditions on an item without writing it */
export interface CheckOperation {
    type: 'check';
    key: ItemKey;
    conditions: WriteCondition[];
}

export type WriteOperation = PutOperation | UpdateOperation | DeleteOperation | CheckOperation;

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when at least one condition of a transaction does not hold.
 * Nothing of the transaction has been applied.
 */
export class ConditionFailedError extends Error {
    /** Positions (in the submitted operation list) whose condition failed */
    readonly failedIndexes: number[];

    constructor(failedIndexes: number[]) {
        super(`Transaction condition failed at operation(s) ${failedIndexes.join(', ')}`);
        this.name = 'ConditionFailedError';
        this.failedIndexes = failedIndexes;
    }

    failedAt(index: number): boolean {
        return this.failedIndexes.includes(index);
    }
}

// =============================================================================
// Gateway Port
// =============================================================================

export interface TableGateway {
    /** Strongly consistent single-item read */
    get(key: ItemKey): Promise<StoredItem | undefined>;

    /** All items of a partition, ordered by SK, optionally restricted to an SK prefix */
    query(pk: string, skPrefix?: string): Promise<StoredItem[]>;

    /** All items of an index partition, ordered by the index sort key */
    queryIndex(index: IndexName, pk: string, skPrefix?: string): Promise<StoredItem[]>;

    /**
     * Apply up to 100 operations all-or-nothing.
     * @throws ConditionFailedError if any condition does not hold
     */
    transact(operations: WriteOperation[]): Promise<void>;

    /**
     * Delete every key. Up to 100 keys go in one transaction; larger sets are
     * deleted in ordered batches, so callers list the parent key first.
     */
    deleteAll(keys: ItemKey[]): Promise<void>;
}

export interface TableGatewayConfig {
    /** DynamoDB table name */
    tableName: string;
    /** AWS region (optional, uses SDK default) */
    region?: string;
}
