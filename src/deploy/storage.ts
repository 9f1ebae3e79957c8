import { Effect, Option } from "effect";
import {
  probeBucket,
  probeTable,
  createBucket,
  createTable,
  type BucketIdentity,
  type TableIdentity,
  type TableSpec,
} from "~/aws";
import { adoptExisting, converged } from "./shared";

// ============ Bucket ============

export const ensureBucket = (name: string, region: string) =>
  Effect.gen(function* () {
    const existing = yield* probeBucket(name);

    if (Option.isSome(existing)) {
      yield* Effect.logDebug(`Bucket ${name} already exists`);
      return converged<BucketIdentity>(existing.value, "unchanged");
    }

    yield* Effect.logInfo(`Creating bucket ${name}...`);
    return yield* createBucket(name, region).pipe(
      Effect.map(created => converged(created, "created")),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(conflict, probeBucket(name)).pipe(Effect.map(found => converged(found, "unchanged")))
      )
    );
  });

// ============ Metadata table ============

export const ensureTable = (spec: TableSpec) =>
  Effect.gen(function* () {
    const existing = yield* probeTable(spec.name);

    if (Option.isSome(existing)) {
      yield* Effect.logDebug(`Table ${spec.name} already exists`);
      return converged<TableIdentity>(existing.value, "unchanged");
    }

    yield* Effect.logInfo(`Creating table ${spec.name} (${spec.hashKey}/${spec.rangeKey}, ${spec.billingMode})...`);
    return yield* createTable(spec).pipe(
      Effect.map(created => converged(created, "created")),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(conflict, probeTable(spec.name)).pipe(Effect.map(found => converged(found, "unchanged")))
      )
    );
  });
