import { Effect, Option } from "effect";
import type { NotificationConfiguration } from "@aws-sdk/client-s3";
import { s3, dynamodb, apigateway, lambda, sqs } from "./clients";
import { RemoteError, missingIdentity, remote } from "./errors";
import {
  presentIdentity,
  bucketArn,
  type BucketIdentity,
  type TableIdentity,
  type ResourceIdentity,
  type FunctionIdentity,
  type MappingIdentity,
} from "./identity";

// Read-only queries against the control plane. A probe never creates or mutates;
// the service's "not found" answer becomes Option.none, anything else a RemoteError.

export const probeBucket = (name: string): Effect.Effect<Option.Option<BucketIdentity>, RemoteError, s3.S3Client> =>
  s3.make("head_bucket", { Bucket: name }).pipe(
    Effect.map(() => Option.some({ name, arn: bucketArn(name) })),
    Effect.catchIf(
      e => e.is("NotFound") || e.is("NoSuchBucket") || e.status === 404,
      () => Effect.succeed(Option.none())
    ),
    remote(name)
  );

export const probeTable = (name: string): Effect.Effect<Option.Option<TableIdentity>, RemoteError, dynamodb.DynamoDBClient> =>
  dynamodb.make("describe_table", { TableName: name }).pipe(
    Effect.map(r => Option.map(presentIdentity(r.Table?.TableArn), arn => ({ name, arn }))),
    Effect.catchIf(
      e => e.is("ResourceNotFoundException"),
      () => Effect.succeed(Option.none())
    ),
    remote(name)
  );

export type ApiCandidate = {
  id: string;
  name: string;
  createdDate?: Date;
};

/**
 * Every REST API carrying `name`. Names are not unique in API Gateway,
 * so the caller decides which candidate to adopt.
 */
export const probeApis = (name: string): Effect.Effect<ApiCandidate[], RemoteError, apigateway.ApiGatewayClient> =>
  Effect.gen(function* () {
    const found: ApiCandidate[] = [];
    let position: string | undefined;

    do {
      const page = yield* apigateway.make("get_rest_apis", {
        limit: 500,
        ...(position ? { position } : {}),
      });
      for (const api of page.items ?? []) {
        if (api.name !== name) continue;
        const id = presentIdentity(api.id);
        if (Option.isNone(id)) continue;
        found.push({ id: id.value, name, ...(api.createdDate ? { createdDate: api.createdDate } : {}) });
      }
      position = Option.getOrUndefined(presentIdentity(page.position));
    } while (position);

    return found;
  }).pipe(remote(name));

export const listApiResources = (apiId: string): Effect.Effect<ResourceIdentity[], RemoteError, apigateway.ApiGatewayClient> =>
  Effect.gen(function* () {
    const resources: ResourceIdentity[] = [];
    let position: string | undefined;

    do {
      const page = yield* apigateway.make("get_resources", {
        restApiId: apiId,
        limit: 500,
        ...(position ? { position } : {}),
      });
      for (const item of page.items ?? []) {
        const id = presentIdentity(item.id);
        if (Option.isNone(id) || item.path === undefined) continue;
        resources.push({ id: id.value, path: item.path, ...(item.parentId ? { parentId: item.parentId } : {}) });
      }
      position = Option.getOrUndefined(presentIdentity(page.position));
    } while (position);

    return resources;
  }).pipe(remote(apiId));

/**
 * Gateway resource whose full path equals `path` exactly (e.g. `/uploadImages`).
 */
export const probeResource = (apiId: string, path: string) =>
  listApiResources(apiId).pipe(
    Effect.map(resources => Option.fromNullable(resources.find(r => r.path === path)))
  );

export type MethodBinding = {
  httpMethod: string;
  authorizationType?: string;
};

export const probeMethod = (
  apiId: string,
  resourceId: string,
  httpMethod: string
): Effect.Effect<Option.Option<MethodBinding>, RemoteError, apigateway.ApiGatewayClient> =>
  apigateway.make("get_method", { restApiId: apiId, resourceId, httpMethod }).pipe(
    Effect.map(r =>
      Option.map(presentIdentity(r.httpMethod), method => ({
        httpMethod: method,
        ...(r.authorizationType ? { authorizationType: r.authorizationType } : {}),
      }))
    ),
    Effect.catchIf(
      e => e.is("NotFoundException"),
      () => Effect.succeed(Option.none())
    ),
    remote(`${apiId}/${resourceId}/${httpMethod}`)
  );

export type IntegrationBinding = {
  type: string;
  uri?: string;
};

export const probeIntegration = (
  apiId: string,
  resourceId: string,
  httpMethod: string
): Effect.Effect<Option.Option<IntegrationBinding>, RemoteError, apigateway.ApiGatewayClient> =>
  apigateway.make("get_integration", { restApiId: apiId, resourceId, httpMethod }).pipe(
    Effect.map(r =>
      Option.map(presentIdentity(r.type), type => ({
        type,
        ...(r.uri ? { uri: r.uri } : {}),
      }))
    ),
    Effect.catchIf(
      e => e.is("NotFoundException"),
      () => Effect.succeed(Option.none())
    ),
    remote(`${apiId}/${resourceId}/${httpMethod}`)
  );

/**
 * Raw resource-based policy document of a function, when it has one.
 */
export const probeFunctionPolicy = (functionName: string): Effect.Effect<Option.Option<string>, RemoteError, lambda.LambdaClient> =>
  lambda.make("get_policy", { FunctionName: functionName }).pipe(
    Effect.map(r => presentIdentity(r.Policy)),
    Effect.catchIf(
      e => e.is("ResourceNotFoundException"),
      () => Effect.succeed(Option.none())
    ),
    remote(functionName)
  );

export const probeFunction = (name: string): Effect.Effect<Option.Option<FunctionIdentity>, RemoteError, lambda.LambdaClient> =>
  lambda.make("get_function", { FunctionName: name }).pipe(
    Effect.map(r => Option.map(presentIdentity(r.Configuration?.FunctionArn), arn => ({ name, arn }))),
    Effect.catchIf(
      e => e.is("ResourceNotFoundException"),
      () => Effect.succeed(Option.none())
    ),
    remote(name)
  );

/**
 * Queue URL for `name`, when the queue exists.
 */
export const probeQueue = (name: string): Effect.Effect<Option.Option<string>, RemoteError, sqs.SQSClient> =>
  sqs.make("get_queue_url", { QueueName: name }).pipe(
    Effect.map(r => presentIdentity(r.QueueUrl)),
    Effect.catchIf(
      e => e.is("QueueDoesNotExist") || e.is("AWS.SimpleQueueService.NonExistentQueue"),
      () => Effect.succeed(Option.none())
    ),
    remote(name)
  );

export const readQueueArn = (name: string, url: string): Effect.Effect<string, RemoteError, sqs.SQSClient> =>
  sqs.make("get_queue_attributes", { QueueUrl: url, AttributeNames: ["QueueArn"] }).pipe(
    remote(name),
    Effect.flatMap(r =>
      Option.match(presentIdentity(r.Attributes?.QueueArn), {
        onNone: () => Effect.fail(missingIdentity("get_queue_attributes", name, "QueueArn")),
        onSome: Effect.succeed,
      })
    )
  );

export const probeQueuePolicy = (name: string, url: string): Effect.Effect<Option.Option<string>, RemoteError, sqs.SQSClient> =>
  sqs.make("get_queue_attributes", { QueueUrl: url, AttributeNames: ["Policy"] }).pipe(
    Effect.map(r => presentIdentity(r.Attributes?.Policy)),
    remote(name)
  );

/**
 * Current notification document of a bucket. A bucket without notifications
 * yields an empty document.
 */
export const probeNotification = (bucket: string): Effect.Effect<NotificationConfiguration, RemoteError, s3.S3Client> =>
  s3.make("get_bucket_notification_configuration", { Bucket: bucket }).pipe(
    Effect.map(r => ({
      ...(r.QueueConfigurations ? { QueueConfigurations: r.QueueConfigurations } : {}),
      ...(r.TopicConfigurations ? { TopicConfigurations: r.TopicConfigurations } : {}),
      ...(r.LambdaFunctionConfigurations ? { LambdaFunctionConfigurations: r.LambdaFunctionConfigurations } : {}),
      ...(r.EventBridgeConfiguration ? { EventBridgeConfiguration: r.EventBridgeConfiguration } : {}),
    })),
    remote(bucket)
  );

export const probeEventSourceMapping = (
  functionName: string,
  sourceArn: string
): Effect.Effect<Option.Option<MappingIdentity>, RemoteError, lambda.LambdaClient> =>
  lambda.make("list_event_source_mappings", { FunctionName: functionName, EventSourceArn: sourceArn }).pipe(
    Effect.map(r => {
      for (const mapping of r.EventSourceMappings ?? []) {
        if (mapping.EventSourceArn !== undefined && mapping.EventSourceArn !== sourceArn) continue;
        const uuid = presentIdentity(mapping.UUID);
        if (Option.isSome(uuid)) return Option.some({ uuid: uuid.value });
      }
      return Option.none();
    }),
    remote(`${functionName} <- ${sourceArn}`)
  );
