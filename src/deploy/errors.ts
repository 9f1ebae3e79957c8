import { Data } from "effect";
import { describeRemoteError, errorMessage, type CreationConflict, type RemoteError } from "~/aws";

/**
 * The freshly created API never answered a resource listing.
 */
export class ReadinessTimeout extends Data.TaggedError("ReadinessTimeout")<{
  apiId: string;
  attempts: number;
}> {}

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  subject: string;
  reason: string;
}> {}

export class PackageError extends Data.TaggedError("PackageError")<{
  entry: string;
  cause: unknown;
}> {}

export type DeployError =
  | RemoteError
  | CreationConflict
  | ReadinessTimeout
  | ConfigurationError
  | PackageError;

/**
 * A deployment step that did not converge. Wraps the underlying failure.
 */
export class StepFailed extends Data.TaggedError("StepFailed")<{
  step: string;
  key: string;
  cause: DeployError;
}> {}

export const describeDeployError = (error: DeployError): string => {
  switch (error._tag) {
    case "RemoteError":
      return describeRemoteError(error);
    case "CreationConflict":
      return `${error.kind} ${error.resource} already exists but cannot be found (${errorMessage(error.cause)})`;
    case "ReadinessTimeout":
      return `API ${error.apiId} not ready after ${error.attempts} attempts`;
    case "ConfigurationError":
      return `${error.subject}: ${error.reason}`;
    case "PackageError":
      return `cannot package ${error.entry}: ${errorMessage(error.cause)}`;
  }
};

/** The one line printed when a deployment stops. */
export const formatFailure = (failure: StepFailed): string =>
  `✗ ${failure.step} failed for ${failure.key}: ${describeDeployError(failure.cause)}`;
