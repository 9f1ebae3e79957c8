import { Duration, Effect, Option, Schedule } from "effect";
import {
  Aws,
  probeApis,
  createApi,
  listApiResources,
  RemoteError,
  type ApiCandidate,
  type ApiIdentity,
  type ResourceIdentity,
} from "~/aws";
import { ReadinessTimeout } from "./errors";
import { converged } from "./shared";

const byCreation = (a: ApiCandidate, b: ApiCandidate): number => {
  const aTime = a.createdDate?.getTime();
  const bTime = b.createdDate?.getTime();

  if (aTime !== undefined && bTime !== undefined && aTime !== bTime) return aTime - bTime;
  if (aTime !== undefined && bTime === undefined) return -1;
  if (aTime === undefined && bTime !== undefined) return 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
};

/**
 * The API to adopt when several share a name: earliest created,
 * then lowest id. Candidates without a creation date sort last.
 */
export const pickApi = (candidates: readonly ApiCandidate[]): Option.Option<ApiCandidate> =>
  Option.fromNullable([...candidates].sort(byCreation)[0]);

export const ensureApi = (name: string, description: string) =>
  Effect.gen(function* () {
    const candidates = yield* probeApis(name);

    if (candidates.length > 1) {
      yield* Effect.logWarning(
        `${candidates.length} APIs are named ${name} (${candidates.map(c => c.id).join(", ")}); using the earliest created`
      );
    }

    const chosen = pickApi(candidates);
    if (Option.isSome(chosen)) {
      yield* Effect.logDebug(`Using existing API ${chosen.value.id}`);
      return converged<ApiIdentity>({ id: chosen.value.id, name }, "unchanged");
    }

    yield* Effect.logInfo(`Creating API ${name}...`);
    return converged(yield* createApi(name, description), "created");
  });

export type Readiness = {
  attempts: number;
  interval: Duration.DurationInput;
};

/**
 * Polls the API's resource listing until it answers, at most
 * `attempts` times in total, `interval` apart.
 */
export const waitForApi = (apiId: string, readiness: Readiness): Effect.Effect<ResourceIdentity[], ReadinessTimeout, Aws.apigateway.ApiGatewayClient> =>
  listApiResources(apiId).pipe(
    Effect.tapError(e => Effect.logDebug(`API ${apiId} not ready yet: ${e.operation} failed`)),
    Effect.retry({
      schedule: Schedule.spaced(readiness.interval),
      times: Math.max(0, readiness.attempts - 1),
    }),
    Effect.mapError(() => new ReadinessTimeout({ apiId, attempts: readiness.attempts }))
  );

export const findRootResource = (apiId: string, resources: readonly ResourceIdentity[]): Effect.Effect<ResourceIdentity, RemoteError> =>
  Option.match(Option.fromNullable(resources.find(r => r.path === "/")), {
    onNone: () => Effect.fail(new RemoteError({
      operation: "get_resources",
      resource: apiId,
      cause: new Error("API has no root resource"),
    })),
    onSome: Effect.succeed,
  });
