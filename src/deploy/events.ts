import { Effect, Option } from "effect";
import type { Event as BucketEvent } from "@aws-sdk/client-s3";
import {
  probeQueue,
  readQueueArn,
  probeQueuePolicy,
  probeNotification,
  probeEventSourceMapping,
  createQueue,
  setQueuePolicy,
  putBucketNotification,
  createEventSourceMapping,
  allowsSource,
  queuePolicyForBucket,
  targetsQueue,
  otherDestinations,
  queueNotification,
  type BucketIdentity,
  type QueueIdentity,
  type MappingIdentity,
  type EventSourceMappingSpec,
} from "~/aws";
import { adoptExisting, converged, type StepStatus } from "./shared";

// ============ Queue ============

const findQueue = (name: string) =>
  Effect.gen(function* () {
    const url = yield* probeQueue(name);
    if (Option.isNone(url)) return Option.none<QueueIdentity>();
    const arn = yield* readQueueArn(name, url.value);
    return Option.some<QueueIdentity>({ name, url: url.value, arn });
  });

export const ensureQueue = (name: string) =>
  Effect.gen(function* () {
    const existing = yield* findQueue(name);

    if (Option.isSome(existing)) {
      yield* Effect.logDebug(`Queue ${name} already exists`);
      return converged(existing.value, "unchanged");
    }

    yield* Effect.logInfo(`Creating queue ${name}...`);
    return yield* createQueue(name).pipe(
      Effect.map(created => converged(created, "created")),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(conflict, findQueue(name)).pipe(Effect.map(found => converged(found, "unchanged")))
      )
    );
  });

/**
 * Lets the bucket deliver events to the queue. A policy already allowing
 * `sqs:SendMessage` from the bucket is left alone; anything else is replaced.
 */
export const ensureQueuePolicy = (queue: QueueIdentity, bucket: BucketIdentity) =>
  Effect.gen(function* () {
    const policy = yield* probeQueuePolicy(queue.name, queue.url);

    if (Option.isSome(policy)) {
      const check = allowsSource(policy.value, bucket.arn, "sqs:SendMessage");
      if (check.via === "unparseable") {
        yield* Effect.logWarning(`Policy of queue ${queue.name} is not valid JSON, replacing it`);
      }
      if (check.found) return "unchanged" as const;
    }

    yield* Effect.logInfo(`Allowing bucket ${bucket.name} to send to ${queue.name}...`);
    yield* setQueuePolicy(queue, queuePolicyForBucket(queue.arn, bucket.arn));
    const status: StepStatus = Option.isSome(policy) ? "updated" : "created";
    return status;
  });

// ============ Bucket notification ============

/**
 * Points the bucket's notifications at the queue. The bucket's whole
 * notification document is replaced, so other destinations are dropped.
 */
export const ensureBucketNotification = (bucket: BucketIdentity, queue: QueueIdentity, events: BucketEvent[]) =>
  Effect.gen(function* () {
    const current = yield* probeNotification(bucket.name);

    if (targetsQueue(current, queue.arn)) {
      yield* Effect.logDebug(`Bucket ${bucket.name} already notifies ${queue.name}`);
      return "unchanged" as const;
    }

    const dropped = otherDestinations(current, queue.arn);
    if (dropped.length > 0) {
      yield* Effect.logWarning(
        `Replacing notification configuration of ${bucket.name}; dropping ${dropped.join(", ")}`
      );
    }

    yield* Effect.logInfo(`Sending ${events.join(", ")} from ${bucket.name} to ${queue.name}...`);
    yield* putBucketNotification(bucket.name, queueNotification(queue.arn, events));
    const status: StepStatus = dropped.length > 0 ? "updated" : "created";
    return status;
  });

// ============ Event source mapping ============

export const ensureEventSourceMapping = (spec: EventSourceMappingSpec) =>
  Effect.gen(function* () {
    const existing = yield* probeEventSourceMapping(spec.functionName, spec.sourceArn);

    if (Option.isSome(existing)) {
      yield* Effect.logDebug(`Mapping ${existing.value.uuid} already feeds ${spec.functionName}`);
      return converged<MappingIdentity>(existing.value, "unchanged");
    }

    yield* Effect.logInfo(`Connecting ${spec.functionName} to ${spec.sourceArn}...`);
    return yield* createEventSourceMapping(spec).pipe(
      Effect.map(created => converged(created, "created")),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(conflict, probeEventSourceMapping(spec.functionName, spec.sourceArn)).pipe(
          Effect.map(found => converged(found, "unchanged"))
        )
      )
    );
  });
