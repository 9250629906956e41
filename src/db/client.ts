import { DynamoDB } from 'aws-sdk';

/**
 * DynamoDB configuration
 * The endpoint addresses the store (a regional endpoint or a local
 * DynamoDB); every call is bounded by the HTTP timeouts below.
 */
export interface DynamoClientOptions {
  endpoint?: string;
  region?: string;
}

export interface DynamoClients {
  documentClient: DynamoDB.DocumentClient;
  /** Raw client for table management operations */
  dynamoDb: DynamoDB;
}

export function createDynamoClients(options: DynamoClientOptions = {}): DynamoClients {
  const dynamoDbConfig: DynamoDB.DocumentClient.DocumentClientOptions & DynamoDB.Types.ClientConfiguration = {
    region: options.region || 'us-east-1',
    maxRetries: 2,
    httpOptions: {
      connectTimeout: 2000,
      timeout: 5000
    },
    ...(options.endpoint ? { endpoint: options.endpoint } : {})
  };

  return {
    documentClient: new DynamoDB.DocumentClient(dynamoDbConfig),
    dynamoDb: new DynamoDB(dynamoDbConfig)
  };
}
