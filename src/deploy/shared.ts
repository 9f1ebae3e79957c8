import { Effect, Option } from "effect";
import type { CreationConflict } from "~/aws";
import { StepFailed, type DeployError } from "./errors";

// ============ Common types ============

export type StepStatus = "created" | "updated" | "unchanged";

export type StepRecord = {
  step: string;
  key: string;
  status: StepStatus;
};

/** A resource after convergence, and what had to be done to get there. */
export type Converged<T> = {
  identity: T;
  status: StepStatus;
};

export const converged = <T>(identity: T, status: StepStatus): Converged<T> => ({ identity, status });

// ============ Step wrapping ============

/**
 * Runs one deployment step: logs are annotated with the step and its key,
 * and any failure is wrapped in `StepFailed`.
 */
export const inStep = (step: string, key: string) =>
  <A, R>(effect: Effect.Effect<A, DeployError, R>): Effect.Effect<A, StepFailed, R> =>
    effect.pipe(
      Effect.mapError(cause => new StepFailed({ step, key, cause })),
      Effect.annotateLogs({ step, key })
    );

// ============ Creation races ============

/**
 * Recovers a create that lost a race: the resource is looked up again and
 * adopted. When it still cannot be found the conflict stands.
 */
export const adoptExisting = <A, E, R>(
  conflict: CreationConflict,
  lookup: Effect.Effect<Option.Option<A>, E, R>
): Effect.Effect<A, E | CreationConflict, R> =>
  Effect.gen(function* () {
    yield* Effect.logInfo(`${conflict.kind} ${conflict.resource} was created concurrently, adopting it`);
    const found = yield* lookup;
    if (Option.isNone(found)) return yield* Effect.fail(conflict);
    return found.value;
  });
