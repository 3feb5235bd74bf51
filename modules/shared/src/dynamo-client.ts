/**
 * Social Events API - DynamoDB Table Gateway
 *
 * Implements the TableGateway port on top of the DynamoDB Document Client.
 * Every multi-row mutation goes through TransactWriteItems, so a request
 * that fails half-way leaves nothing behind.
 *
 * Configuration:
 *   - TABLE_NAME: Injected via environment variable
 *   - Region: AWS_REGION or the SDK default (Lambda execution role region)
 *
 * Design Principles:
 *   - Uniqueness is held by key design plus attribute_not_exists conditions
 *   - Counters (ticket quota, admin and organizer counts) change only through
 *     conditional increments inside the same transaction as the rows they guard
 *   - No internal retries; a failed condition surfaces as ConditionFailedError
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

import { DynamoDBClient, TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
    DynamoDBDocumentClient,
    GetCommand,
    QueryCommand,
    TransactWriteCommand,
} from '@aws-sdk/lib-dynamodb';
import type { TransactWriteCommandInput } from '@aws-sdk/lib-dynamodb';

import { MAX_TRANSACTION_ITEMS } from './constants';
import { ConditionFailedError } from './storage/types';
import type {
    IndexName,
    ItemKey,
    StoredItem,
    TableGateway,
    TableGatewayConfig,
    UpdateOperation,
    WriteCondition,
    WriteOperation,
} from './storage/types';

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

/** The part of the Document Client the gateway talks to */
export type DocumentSender = Pick<DynamoDBDocumentClient, 'send'>;

// =============================================================================
// Expression Builders
// =============================================================================

interface ExpressionParts {
    names: Record<string, string>;
    values: Record<string, unknown>;
}

function conditionExpression(
    conditions: WriteCondition[],
    parts: ExpressionParts
): string | undefined {
    if (conditions.length === 0) {
        return undefined;
    }

    return conditions
        .map((condition, i) => {
            switch (condition.kind) {
                case 'exists':
                    return 'attribute_exists(PK)';
                case 'notExists':
                    return 'attribute_not_exists(PK)';
                case 'lessThanAttribute':
                    parts.names[`#c${i}`] = condition.attribute;
                    parts.names[`#c${i}l`] = condition.limitAttribute;
                    return `#c${i} < #c${i}l`;
                case 'atMost':
                    parts.names[`#c${i}`] = condition.attribute;
                    parts.values[`:c${i}`] = condition.value;
                    return `#c${i} <= :c${i}`;
                case 'greaterThan':
                    parts.names[`#c${i}`] = condition.attribute;
                    parts.values[`:c${i}`] = condition.value;
                    return `#c${i} > :c${i}`;
                case 'equals':
                    parts.names[`#c${i}`] = condition.attribute;
                    parts.values[`:c${i}`] = condition.value;
                    return `#c${i} = :c${i}`;
            }
        })
        .join(' AND ');
}

function updateExpression(op: UpdateOperation, parts: ExpressionParts): string {
    const setClauses = Object.entries(op.set ?? {}).map(([attribute, value], i) => {
        parts.names[`#s${i}`] = attribute;
        parts.values[`:s${i}`] = value;
        return `#s${i} = :s${i}`;
    });

    const incrementClauses = Object.entries(op.increment ?? {}).map(([attribute, by], i) => {
        parts.names[`#n${i}`] = attribute;
        parts.values[`:n${i}`] = by;
        parts.values[':zero'] = 0;
        return `#n${i} = if_not_exists(#n${i}, :zero) + :n${i}`;
    });

    const removeClauses = (op.remove ?? []).map((attribute, i) => {
        parts.names[`#r${i}`] = attribute;
        return `#r${i}`;
    });

    const clauses: string[] = [];
    const assignments = [...setClauses, ...incrementClauses];
    if (assignments.length > 0) {
        clauses.push(`SET ${assignments.join(', ')}`);
    }
    if (removeClauses.length > 0) {
        clauses.push(`REMOVE ${removeClauses.join(', ')}`);
    }
    if (clauses.length === 0) {
        throw new Error(`Update of ${op.key.PK}/${op.key.SK} has nothing to change`);
    }
    return clauses.join(' ');
}

function expressionAttributes(parts: ExpressionParts): {
    ExpressionAttributeNames?: Record<string, string>;
    ExpressionAttributeValues?: Record<string, unknown>;
} {
    return {
        ...(Object.keys(parts.names).length > 0 && { ExpressionAttributeNames: parts.names }),
        ...(Object.keys(parts.values).length > 0 && { ExpressionAttributeValues: parts.values }),
    };
}

/**
 * Translate one write operation into a TransactWriteItems entry.
 */
export function toTransactItem(tableName: string, op: WriteOperation): TransactItem {
    const parts: ExpressionParts = { names: {}, values: {} };

    switch (op.type) {
        case 'put': {
            const ConditionExpression = conditionExpression(op.conditions ?? [], parts);
            return {
                Put: {
                    TableName: tableName,
                    Item: op.item,
                    ConditionExpression,
                    ...expressionAttributes(parts),
                },
            };
        }
        case 'update': {
            const UpdateExpression = updateExpression(op, parts);
            const ConditionExpression = conditionExpression(op.conditions ?? [], parts);
            return {
                Update: {
                    TableName: tableName,
                    Key: { PK: op.key.PK, SK: op.key.SK },
                    UpdateExpression,
                    ConditionExpression,
                    ...expressionAttributes(parts),
                },
            };
        }
        case 'delete': {
            const ConditionExpression = conditionExpression(op.conditions ?? [], parts);
            return {
                Delete: {
                    TableName: tableName,
                    Key: { PK: op.key.PK, SK: op.key.SK },
                    ConditionExpression,
                    ...expressionAttributes(parts),
                },
            };
        }
        case 'check': {
            const ConditionExpression = conditionExpression(op.conditions, parts) ?? 'attribute_exists(PK)';
            return {
                ConditionCheck: {
                    TableName: tableName,
                    Key: { PK: op.key.PK, SK: op.key.SK },
                    ConditionExpression,
                    ...expressionAttributes(parts),
                },
            };
        }
    }
}

/**
 * Split a list into consecutive chunks of at most `size` elements.
 */
export function chunk<T>(items: T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

// =============================================================================
// DynamoDB Gateway
// =============================================================================

export class DynamoTableGateway implements TableGateway {
    private readonly client: DocumentSender;
    private readonly tableName: string;

    constructor(config: TableGatewayConfig, client?: DocumentSender) {
        this.tableName = config.tableName;

        this.client = client ?? DynamoDBDocumentClient.from(
            new DynamoDBClient({ region: config.region }),
            {
                marshallOptions: {
                    removeUndefinedValues: true,
                },
                unmarshallOptions: {
                    wrapNumbers: false,
                },
            }
        );
    }

    async get(key: ItemKey): Promise<StoredItem | undefined> {
        const result = await this.client.send(
            new GetCommand({
                TableName: this.tableName,
                Key: { PK: key.PK, SK: key.SK },
                ConsistentRead: true,
            })
        );

        return result.Item;
    }

    async query(pk: string, skPrefix?: string): Promise<StoredItem[]> {
        return this.queryAll(
            undefined,
            skPrefix ? 'PK = :pk AND begins_with(SK, :sk)' : 'PK = :pk',
            pk,
            skPrefix
        );
    }

    async queryIndex(index: IndexName, pk: string, skPrefix?: string): Promise<StoredItem[]> {
        return this.queryAll(
            index,
            skPrefix
                ? `${index}PK = :pk AND begins_with(${index}SK, :sk)`
                : `${index}PK = :pk`,
            pk,
            skPrefix
        );
    }

    async transact(operations: WriteOperation[]): Promise<void> {
        if (operations.length === 0) {
            return;
        }
        if (operations.length > MAX_TRANSACTION_ITEMS) {
            throw new Error(
                `Transaction of ${operations.length} operations exceeds the limit of ${MAX_TRANSACTION_ITEMS}`
            );
        }

        try {
            await this.client.send(
                new TransactWriteCommand({
                    TransactItems: operations.map((op) => toTransactItem(this.tableName, op)),
                })
            );
        } catch (err) {
            if (err instanceof TransactionCanceledException) {
                const failedIndexes = (err.CancellationReasons ?? []).flatMap((reason, index) =>
                    reason.Code === 'ConditionalCheckFailed' ? [index] : []
                );
                if (failedIndexes.length > 0) {
                    throw new ConditionFailedError(failedIndexes);
                }
            }
            throw err;
        }
    }

    async deleteAll(keys: ItemKey[]): Promise<void> {
        for (const batch of chunk(keys, MAX_TRANSACTION_ITEMS)) {
            await this.transact(batch.map((key) => ({ type: 'delete', key })));
        }
    }

    private async queryAll(
        indexName: IndexName | undefined,
        keyCondition: string,
        pk: string,
        skPrefix: string | undefined
    ): Promise<StoredItem[]> {
        const items: StoredItem[] = [];
        let exclusiveStartKey: StoredItem | undefined;

        do {
            const result = await this.client.send(
                new QueryCommand({
                    TableName: this.tableName,
                    IndexName: indexName,
                    KeyConditionExpression: keyCondition,
                    ExpressionAttributeValues: {
                        ':pk': pk,
                        ...(skPrefix !== undefined && { ':sk': skPrefix }),
                    },
                    ExclusiveStartKey: exclusiveStartKey,
                })
            );
            items.push(...(result.Items ?? []));
            exclusiveStartKey = result.LastEvaluatedKey;
        } while (exclusiveStartKey);

        return items;
    }
}

// =============================================================================
// Gateway Singleton
// =============================================================================

let gateway: TableGateway | null = null;

/**
 * Return the process-wide gateway, created on first use.
 * The gateway holds no request state; it is safe to share across invocations.
 */
export function getTableGateway(config: TableGatewayConfig): TableGateway {
    if (!gateway) {
        gateway = new DynamoTableGateway(config);
    }
    return gateway;
}

/**
 * Replace the process-wide gateway (tests install an in-process table).
 * Passing null resets it so the next call creates a DynamoDB gateway.
 */
export function setTableGateway(replacement: TableGateway | null): void {
    gateway = replacement;
}
