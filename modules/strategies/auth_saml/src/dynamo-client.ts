/**
 * SAML Strategy - DynamoDB Client
 *
 * Singleton DynamoDB Document Client, reused across warm invocations.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

let docClient: DynamoDBDocumentClient | null = null;

/**
 * Get or create the DynamoDB Document Client.
 * Region and credentials come from the Lambda execution environment.
 */
export function getDocClient(): DynamoDBDocumentClient {
    if (!docClient) {
        docClient = DynamoDBDocumentClient.from(new DynamoDBClient({}), {
            marshallOptions: {
                removeUndefinedValues: true,
            },
        });
    }
    return docClient;
}
