// Clients
export * as Aws from "./clients/index";
export { makeClients, errorMessage } from "./clients/index";
export type { AwsClients, AwsError, ClientConfig } from "./clients/index";

// Errors
export { RemoteError, CreationConflict, describeRemoteError } from "./errors";
export type { ResourceKind } from "./errors";

// Identities
export * from "./identity";

// Probes
export {
  probeBucket,
  probeTable,
  probeApis,
  listApiResources,
  probeResource,
  probeMethod,
  probeIntegration,
  probeFunctionPolicy,
  probeFunction,
  probeQueue,
  readQueueArn,
  probeQueuePolicy,
  probeNotification,
  probeEventSourceMapping,
} from "./probe";
export type { ApiCandidate, MethodBinding, IntegrationBinding } from "./probe";

// Creators
export {
  createBucket,
  putBucketNotification,
  createTable,
  createApi,
  createResource,
  putMethod,
  putIntegration,
  createDeployment,
  addPermission,
  createFunction,
  waitForFunctionActive,
  updateFunctionCode,
  updateFunctionConfiguration,
  createEventSourceMapping,
  createQueue,
  setQueuePolicy,
} from "./create";
export type { TableSpec, PermissionGrant, FunctionSpec, EventSourceMappingSpec } from "./create";

// Documents
export {
  hasStatementId,
  allowsSource,
  queuePolicyForBucket,
  targetsQueue,
  otherDestinations,
  queueNotification,
} from "./documents";
export type { PolicyCheck } from "./documents";
