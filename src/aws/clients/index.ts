import { Layer } from "effect";
import * as s3 from "./s3";
import * as dynamodb from "./dynamodb";
import * as apigateway from "./apigateway";
import * as lambda from "./lambda";
import * as sqs from "./sqs";
import type { ClientConfig } from "./shared";

export { s3, dynamodb, apigateway, lambda, sqs };
export type { ClientConfig } from "./shared";
export { errorMessage } from "./shared";

export type AwsError =
  | s3.S3Error
  | dynamodb.DynamoDBError
  | apigateway.ApiGatewayError
  | lambda.LambdaError
  | sqs.SQSError;

export type AwsClients =
  | s3.S3Client
  | dynamodb.DynamoDBClient
  | apigateway.ApiGatewayClient
  | lambda.LambdaClient
  | sqs.SQSClient;

/**
 * All control-plane clients the deployer talks to, sharing one region/endpoint.
 */
export const makeClients = (config: ClientConfig): Layer.Layer<AwsClients> =>
  Layer.mergeAll(
    s3.layer(config),
    dynamodb.layer(config),
    apigateway.layer(config),
    lambda.layer(config),
    sqs.layer(config),
  );
