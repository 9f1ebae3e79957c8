import { Context, Data, Effect, Layer } from "effect";
import {
  SQSClient as SdkSQSClient,
  GetQueueUrlCommand,
  CreateQueueCommand,
  GetQueueAttributesCommand,
  SetQueueAttributesCommand,
  type GetQueueUrlCommandInput,
  type GetQueueUrlCommandOutput,
  type CreateQueueCommandInput,
  type CreateQueueCommandOutput,
  type GetQueueAttributesCommandInput,
  type GetQueueAttributesCommandOutput,
  type SetQueueAttributesCommandInput,
  type SetQueueAttributesCommandOutput,
} from "@aws-sdk/client-sqs";
import { errorName, toSdkConfig, type ClientConfig } from "./shared";

type Operations = {
  get_queue_url: [GetQueueUrlCommandInput, GetQueueUrlCommandOutput];
  create_queue: [CreateQueueCommandInput, CreateQueueCommandOutput];
  get_queue_attributes: [GetQueueAttributesCommandInput, GetQueueAttributesCommandOutput];
  set_queue_attributes: [SetQueueAttributesCommandInput, SetQueueAttributesCommandOutput];
};

export type SQSApi = {
  readonly [K in keyof Operations]: (input: Operations[K][0]) => Promise<Operations[K][1]>;
};

export class SQSClient extends Context.Tag("SQSClient")<SQSClient, SQSApi>() {}

export class SQSError extends Data.TaggedError("SQSError")<{
  operation: keyof Operations;
  cause: unknown;
}> {
  is(name: string): boolean {
    return errorName(this.cause) === name;
  }
}

export const make = <K extends keyof Operations>(operation: K, input: Operations[K][0]) =>
  Effect.flatMap(SQSClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new SQSError({ operation, cause }),
    })
  );

export const layer = (config: ClientConfig) =>
  Layer.sync(SQSClient, () => {
    const client = new SdkSQSClient(toSdkConfig(config));
    return {
      get_queue_url: input => client.send(new GetQueueUrlCommand(input)),
      create_queue: input => client.send(new CreateQueueCommand(input)),
      get_queue_attributes: input => client.send(new GetQueueAttributesCommand(input)),
      set_queue_attributes: input => client.send(new SetQueueAttributesCommand(input)),
    };
  });
