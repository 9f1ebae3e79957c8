import { Data, Effect } from "effect";
import { errorMessage, type AwsError } from "./clients";

export type ResourceKind =
  | "bucket"
  | "table"
  | "api"
  | "resource"
  | "method"
  | "integration"
  | "permission"
  | "function"
  | "queue"
  | "queue-policy"
  | "notification"
  | "event-source-mapping"
  | "deployment";

/**
 * Any control-plane failure that is not a recognised "not found" or "already exists".
 */
export class RemoteError extends Data.TaggedError("RemoteError")<{
  operation: string;
  resource: string;
  cause: unknown;
}> {}

/**
 * The resource appeared between the probe and the create call.
 */
export class CreationConflict extends Data.TaggedError("CreationConflict")<{
  kind: ResourceKind;
  resource: string;
  cause: unknown;
}> {}

export const describeRemoteError = (error: RemoteError): string =>
  `${error.operation} on ${error.resource}: ${errorMessage(error.cause)}`;

/** Maps client failures of an effect into `RemoteError` for the given resource key. */
export const remote = (resource: string) =>
  <A, R>(effect: Effect.Effect<A, AwsError, R>): Effect.Effect<A, RemoteError, R> =>
    Effect.mapError(effect, e => new RemoteError({ operation: e.operation, resource, cause: e.cause }));

/** A response that should have carried an identity but did not. */
export const missingIdentity = (operation: string, resource: string, field: string) =>
  new RemoteError({ operation, resource, cause: new Error(`response has no ${field}`) });
