import { Context, Data, Effect, Layer } from "effect";
import {
  S3Client as SdkS3Client,
  HeadBucketCommand,
  CreateBucketCommand,
  GetBucketNotificationConfigurationCommand,
  PutBucketNotificationConfigurationCommand,
  type HeadBucketCommandInput,
  type HeadBucketCommandOutput,
  type CreateBucketCommandInput,
  type CreateBucketCommandOutput,
  type GetBucketNotificationConfigurationCommandInput,
  type GetBucketNotificationConfigurationCommandOutput,
  type PutBucketNotificationConfigurationCommandInput,
  type PutBucketNotificationConfigurationCommandOutput,
} from "@aws-sdk/client-s3";
import { errorName, errorStatus, toSdkConfig, type ClientConfig } from "./shared";

type Operations = {
  head_bucket: [HeadBucketCommandInput, HeadBucketCommandOutput];
  create_bucket: [CreateBucketCommandInput, CreateBucketCommandOutput];
  get_bucket_notification_configuration: [GetBucketNotificationConfigurationCommandInput, GetBucketNotificationConfigurationCommandOutput];
  put_bucket_notification_configuration: [PutBucketNotificationConfigurationCommandInput, PutBucketNotificationConfigurationCommandOutput];
};

export type S3Api = {
  readonly [K in keyof Operations]: (input: Operations[K][0]) => Promise<Operations[K][1]>;
};

export class S3Client extends Context.Tag("S3Client")<S3Client, S3Api>() {}

export class S3Error extends Data.TaggedError("S3Error")<{
  operation: keyof Operations;
  cause: unknown;
}> {
  is(name: string): boolean {
    return errorName(this.cause) === name;
  }
  get status(): number | undefined {
    return errorStatus(this.cause);
  }
}

export const make = <K extends keyof Operations>(operation: K, input: Operations[K][0]) =>
  Effect.flatMap(S3Client, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new S3Error({ operation, cause }),
    })
  );

export const layer = (config: ClientConfig) =>
  Layer.sync(S3Client, () => {
    const client = new SdkS3Client({
      ...toSdkConfig(config),
      // LocalStack serves buckets on the path, not on a subdomain
      ...(config.endpoint ? { forcePathStyle: true } : {}),
    });
    return {
      head_bucket: input => client.send(new HeadBucketCommand(input)),
      create_bucket: input => client.send(new CreateBucketCommand(input)),
      get_bucket_notification_configuration: input => client.send(new GetBucketNotificationConfigurationCommand(input)),
      put_bucket_notification_configuration: input => client.send(new PutBucketNotificationConfigurationCommand(input)),
    };
  });
