import { Effect, Option, Schedule } from "effect";
import { BucketLocationConstraint, type NotificationConfiguration } from "@aws-sdk/client-s3";
import type { BillingMode } from "@aws-sdk/client-dynamodb";
import type { Runtime } from "@aws-sdk/client-lambda";
import { s3, dynamodb, apigateway, lambda, sqs, type AwsError } from "./clients";
import { CreationConflict, RemoteError, missingIdentity, remote, type ResourceKind } from "./errors";
import { readQueueArn } from "./probe";
import {
  presentIdentity,
  bucketArn,
  type BucketIdentity,
  type TableIdentity,
  type ApiIdentity,
  type ResourceIdentity,
  type FunctionIdentity,
  type QueueIdentity,
  type MappingIdentity,
  type DeploymentRecord,
} from "./identity";

// Creation calls. The caller has already probed; a resource that shows up
// in between surfaces as CreationConflict.

const conflictOn = (kind: ResourceKind, resource: string, names: readonly string[]) =>
  <A, R>(effect: Effect.Effect<A, AwsError, R>): Effect.Effect<A, CreationConflict | RemoteError, R> =>
    Effect.mapError(effect, e =>
      names.some(name => e.is(name))
        ? new CreationConflict({ kind, resource, cause: e.cause })
        : new RemoteError({ operation: e.operation, resource, cause: e.cause })
    );

const requireIdentity = (operation: string, resource: string, field: string) =>
  (value: string | undefined): Effect.Effect<string, RemoteError> =>
    Option.match(presentIdentity(value), {
      onNone: () => Effect.fail(missingIdentity(operation, resource, field)),
      onSome: Effect.succeed,
    });

// ============ S3 ============

const LOCATION_CONSTRAINTS: ReadonlySet<string> = new Set(Object.values(BucketLocationConstraint));

const isLocationConstraint = (region: string): region is BucketLocationConstraint =>
  LOCATION_CONSTRAINTS.has(region);

export const createBucket = (name: string, region: string): Effect.Effect<BucketIdentity, CreationConflict | RemoteError, s3.S3Client> =>
  s3.make("create_bucket", {
    Bucket: name,
    ...(region !== "us-east-1" && isLocationConstraint(region)
      ? { CreateBucketConfiguration: { LocationConstraint: region } }
      : {}),
  }).pipe(
    conflictOn("bucket", name, ["BucketAlreadyOwnedByYou", "BucketAlreadyExists"]),
    Effect.as({ name, arn: bucketArn(name) })
  );

/**
 * Overwrites the bucket's whole notification document.
 */
export const putBucketNotification = (bucket: string, configuration: NotificationConfiguration) =>
  s3.make("put_bucket_notification_configuration", {
    Bucket: bucket,
    NotificationConfiguration: configuration,
  }).pipe(remote(bucket), Effect.asVoid);

// ============ DynamoDB ============

export type TableSpec = {
  name: string;
  hashKey: string;
  rangeKey: string;
  billingMode: BillingMode;
};

const TABLE_ACTIVE_ATTEMPTS = 30;
const TABLE_ACTIVE_DELAY = "1 second";

const waitForTableActive = (name: string) =>
  Effect.gen(function* () {
    for (let attempt = 0; attempt < TABLE_ACTIVE_ATTEMPTS; attempt++) {
      const result = yield* dynamodb.make("describe_table", { TableName: name }).pipe(remote(name));
      const status = result.Table?.TableStatus;

      if (status === "ACTIVE") {
        return yield* requireIdentity("describe_table", name, "TableArn")(result.Table?.TableArn);
      }
      if (status !== undefined && status !== "CREATING" && status !== "UPDATING") {
        return yield* Effect.fail(new RemoteError({
          operation: "describe_table",
          resource: name,
          cause: new Error(`table is in unexpected state ${status}`),
        }));
      }

      yield* Effect.logDebug(`Table ${name} is ${status ?? "not visible yet"}, waiting`);
      yield* Effect.sleep(TABLE_ACTIVE_DELAY);
    }

    return yield* Effect.fail(new RemoteError({
      operation: "describe_table",
      resource: name,
      cause: new Error("timed out waiting for table to become ACTIVE"),
    }));
  });

export const createTable = (spec: TableSpec): Effect.Effect<TableIdentity, CreationConflict | RemoteError, dynamodb.DynamoDBClient> =>
  Effect.gen(function* () {
    const created = yield* dynamodb.make("create_table", {
      TableName: spec.name,
      AttributeDefinitions: [
        { AttributeName: spec.hashKey, AttributeType: "S" },
        { AttributeName: spec.rangeKey, AttributeType: "S" },
      ],
      KeySchema: [
        { AttributeName: spec.hashKey, KeyType: "HASH" },
        { AttributeName: spec.rangeKey, KeyType: "RANGE" },
      ],
      BillingMode: spec.billingMode,
    }).pipe(conflictOn("table", spec.name, ["ResourceInUseException"]));

    const description = created.TableDescription;
    const arn = description?.TableStatus === "ACTIVE"
      ? yield* requireIdentity("create_table", spec.name, "TableArn")(description.TableArn)
      : yield* waitForTableActive(spec.name);

    return { name: spec.name, arn };
  });

// ============ API Gateway ============

export const createApi = (name: string, description: string): Effect.Effect<ApiIdentity, RemoteError, apigateway.ApiGatewayClient> =>
  apigateway.make("create_rest_api", {
    name,
    description,
    endpointConfiguration: { types: ["EDGE"] },
  }).pipe(
    remote(name),
    Effect.flatMap(r => requireIdentity("create_rest_api", name, "id")(r.id)),
    Effect.map(id => ({ id, name }))
  );

export const createResource = (
  apiId: string,
  parentId: string,
  pathPart: string
): Effect.Effect<ResourceIdentity, CreationConflict | RemoteError, apigateway.ApiGatewayClient> =>
  apigateway.make("create_resource", { restApiId: apiId, parentId, pathPart }).pipe(
    conflictOn("resource", `/${pathPart}`, ["ConflictException"]),
    Effect.flatMap(r =>
      requireIdentity("create_resource", `/${pathPart}`, "id")(r.id).pipe(
        Effect.map(id => ({ id, path: r.path ?? `/${pathPart}`, parentId }))
      )
    )
  );

export const putMethod = (apiId: string, resourceId: string, httpMethod: string) =>
  apigateway.make("put_method", {
    restApiId: apiId,
    resourceId,
    httpMethod,
    authorizationType: "NONE",
  }).pipe(
    conflictOn("method", `${apiId}/${resourceId}/${httpMethod}`, ["ConflictException"]),
    Effect.asVoid
  );

/**
 * Lambda proxy integration: the whole request is handed to the function.
 */
export const putIntegration = (apiId: string, resourceId: string, httpMethod: string, uri: string) =>
  apigateway.make("put_integration", {
    restApiId: apiId,
    resourceId,
    httpMethod,
    type: "AWS_PROXY",
    integrationHttpMethod: "POST",
    uri,
  }).pipe(remote(`${apiId}/${resourceId}/${httpMethod}`), Effect.asVoid);

export const createDeployment = (apiId: string, stageName: string): Effect.Effect<DeploymentRecord, RemoteError, apigateway.ApiGatewayClient> =>
  apigateway.make("create_deployment", { restApiId: apiId, stageName }).pipe(
    remote(`${apiId}/${stageName}`),
    Effect.flatMap(r => requireIdentity("create_deployment", `${apiId}/${stageName}`, "id")(r.id)),
    Effect.map(deploymentId => ({ apiId, stageName, deploymentId }))
  );

// ============ Lambda ============

export type PermissionGrant = {
  functionName: string;
  statementId: string;
  action: string;
  principal: string;
  sourceArn: string;
};

export const addPermission = (grant: PermissionGrant) =>
  lambda.make("add_permission", {
    FunctionName: grant.functionName,
    StatementId: grant.statementId,
    Action: grant.action,
    Principal: grant.principal,
    SourceArn: grant.sourceArn,
  }).pipe(
    conflictOn("permission", `${grant.functionName}#${grant.statementId}`, ["ResourceConflictException"]),
    Effect.asVoid
  );

export type FunctionSpec = {
  name: string;
  code: Uint8Array;
  handler: string;
  runtime: Runtime;
  timeout: number;
  roleArn: string;
  environment: Record<string, string>;
};

const FUNCTION_ACTIVE_ATTEMPTS = 30;
const FUNCTION_ACTIVE_SPACING = "2 seconds";

/**
 * Waits until the function is Active and its last update has finished.
 * Lambda rejects further updates while one is still in progress.
 */
export const waitForFunctionActive = (name: string): Effect.Effect<void, RemoteError, lambda.LambdaClient> =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Waiting for function ${name} to become active...`);
    yield* lambda.make("get_function", { FunctionName: name }).pipe(
      remote(name),
      Effect.filterOrFail(
        r => r.Configuration?.State === "Active" &&
          (!r.Configuration.LastUpdateStatus || r.Configuration.LastUpdateStatus === "Successful"),
        r => new RemoteError({
          operation: "get_function",
          resource: name,
          cause: new Error(
            `function state ${r.Configuration?.State ?? "unknown"}, update status ${r.Configuration?.LastUpdateStatus ?? "unknown"}`
          ),
        })
      ),
      Effect.retry({ times: FUNCTION_ACTIVE_ATTEMPTS, schedule: Schedule.spaced(FUNCTION_ACTIVE_SPACING) })
    );
    yield* Effect.logDebug(`Function ${name} is active`);
  });

export const createFunction = (spec: FunctionSpec): Effect.Effect<FunctionIdentity, CreationConflict | RemoteError, lambda.LambdaClient> =>
  lambda.make("create_function", {
    FunctionName: spec.name,
    Runtime: spec.runtime,
    Role: spec.roleArn,
    Handler: spec.handler,
    Code: { ZipFile: spec.code },
    Timeout: spec.timeout,
    Environment: { Variables: spec.environment },
  }).pipe(
    conflictOn("function", spec.name, ["ResourceConflictException"]),
    Effect.flatMap(r => requireIdentity("create_function", spec.name, "FunctionArn")(r.FunctionArn)),
    Effect.tap(() => waitForFunctionActive(spec.name)),
    Effect.map(arn => ({ name: spec.name, arn }))
  );

export const updateFunctionCode = (name: string, code: Uint8Array): Effect.Effect<FunctionIdentity, RemoteError, lambda.LambdaClient> =>
  lambda.make("update_function_code", { FunctionName: name, ZipFile: code }).pipe(
    remote(name),
    Effect.flatMap(r => requireIdentity("update_function_code", name, "FunctionArn")(r.FunctionArn)),
    Effect.tap(() => waitForFunctionActive(name)),
    Effect.map(arn => ({ name, arn }))
  );

/**
 * A configuration update that collides with one still in progress is
 * retried once the function settles.
 */
export const updateFunctionConfiguration = (
  spec: Omit<FunctionSpec, "code" | "runtime" | "roleArn">
): Effect.Effect<void, RemoteError, lambda.LambdaClient> => {
  const update = lambda.make("update_function_configuration", {
    FunctionName: spec.name,
    Timeout: spec.timeout,
    Handler: spec.handler,
    Environment: { Variables: spec.environment },
  });

  return update.pipe(
    Effect.catchAll(e =>
      Effect.gen(function* () {
        if (!e.is("ResourceConflictException")) return yield* Effect.fail(e).pipe(remote(spec.name));
        yield* Effect.logDebug(`Update of ${spec.name} still in progress, retrying configuration`);
        yield* waitForFunctionActive(spec.name);
        return yield* update.pipe(remote(spec.name));
      })
    ),
    Effect.tap(() => waitForFunctionActive(spec.name)),
    Effect.asVoid
  );
};

export type EventSourceMappingSpec = {
  functionName: string;
  sourceArn: string;
  batchSize: number;
  startingPosition: "LATEST" | "TRIM_HORIZON";
};

export const createEventSourceMapping = (
  spec: EventSourceMappingSpec
): Effect.Effect<MappingIdentity, CreationConflict | RemoteError, lambda.LambdaClient> => {
  const key = `${spec.functionName} <- ${spec.sourceArn}`;
  return lambda.make("create_event_source_mapping", {
    FunctionName: spec.functionName,
    EventSourceArn: spec.sourceArn,
    BatchSize: spec.batchSize,
    StartingPosition: spec.startingPosition,
    Enabled: true,
  }).pipe(
    conflictOn("event-source-mapping", key, ["ResourceConflictException"]),
    Effect.flatMap(r => requireIdentity("create_event_source_mapping", key, "UUID")(r.UUID)),
    Effect.map(uuid => ({ uuid }))
  );
};

// ============ SQS ============

export const createQueue = (name: string): Effect.Effect<QueueIdentity, CreationConflict | RemoteError, sqs.SQSClient> =>
  Effect.gen(function* () {
    const created = yield* sqs.make("create_queue", { QueueName: name }).pipe(
      conflictOn("queue", name, ["QueueNameExists", "QueueAlreadyExists"])
    );
    const url = yield* requireIdentity("create_queue", name, "QueueUrl")(created.QueueUrl);
    const arn = yield* readQueueArn(name, url);
    return { name, url, arn };
  });

export const setQueuePolicy = (queue: QueueIdentity, policy: string) =>
  sqs.make("set_queue_attributes", {
    QueueUrl: queue.url,
    Attributes: { Policy: policy },
  }).pipe(remote(queue.name), Effect.asVoid);
