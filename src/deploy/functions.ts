import { Effect, Option } from "effect";
import {
  probeFunction,
  createFunction,
  updateFunctionCode,
  updateFunctionConfiguration,
  RemoteError,
  type FunctionIdentity,
} from "~/aws";
import type { FunctionConfig, ImageServiceConfig } from "~/config";
import type { EnvironmentDocument } from "./environment";
import type { PackageError } from "./errors";
import { lookupFunction } from "./resolve-config";
import { adoptExisting, converged } from "./shared";

/** Produces the deployment archive of one function. */
export type PackageCode = (name: string, fn: FunctionConfig) => Effect.Effect<Uint8Array, PackageError>;

export type DeployFunctionInput = {
  name: string;
  code: Uint8Array;
  environment: EnvironmentDocument;
  lambda: ImageServiceConfig["lambda"];
};

const updateFunction = ({ name, code, environment, lambda }: DeployFunctionInput) =>
  Effect.gen(function* () {
    yield* Effect.logInfo(`Updating function ${name}...`);
    const updated = yield* updateFunctionCode(name, code);
    yield* updateFunctionConfiguration({
      name,
      timeout: lambda.timeout,
      handler: lambda.handler,
      environment: environment.Variables,
    });
    return converged<FunctionIdentity>(updated, "updated");
  });

/**
 * Creates the function, or pushes code and configuration to an existing one.
 * Both updates run on every deployment, also on a function another writer
 * created while this one was being created.
 */
export const deployFunction = (input: DeployFunctionInput) =>
  Effect.gen(function* () {
    const { name, code, environment, lambda } = input;
    const existing = yield* probeFunction(name);

    if (Option.isSome(existing)) return yield* updateFunction(input);

    yield* Effect.logInfo(`Creating function ${name}...`);
    return yield* createFunction({
      name,
      code,
      handler: lambda.handler,
      runtime: lambda.runtime,
      timeout: lambda.timeout,
      roleArn: lambda.roleArn,
      environment: environment.Variables,
    }).pipe(
      Effect.map(created => converged(created, "created")),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(conflict, probeFunction(name)).pipe(Effect.andThen(updateFunction(input)))
      )
    );
  });

/**
 * Re-packages one configured function and uploads its code only.
 * The function must already exist.
 */
export const updateCode = (config: ImageServiceConfig, name: string, packageCode: PackageCode) =>
  Effect.gen(function* () {
    const fn = yield* lookupFunction(config, name);
    const existing = yield* probeFunction(name);

    if (Option.isNone(existing)) {
      return yield* Effect.fail(new RemoteError({
        operation: "get_function",
        resource: name,
        cause: new Error("function does not exist, run deploy first"),
      }));
    }

    const code = yield* packageCode(name, fn);
    yield* Effect.logInfo(`Uploading code of ${name} (${code.byteLength} bytes)...`);
    return yield* updateFunctionCode(name, code);
  });
