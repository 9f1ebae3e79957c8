import { Context, Data, Effect, Layer } from "effect";
import {
  DynamoDBClient as SdkDynamoDBClient,
  DescribeTableCommand,
  CreateTableCommand,
  type DescribeTableCommandInput,
  type DescribeTableCommandOutput,
  type CreateTableCommandInput,
  type CreateTableCommandOutput,
} from "@aws-sdk/client-dynamodb";
import { errorName, toSdkConfig, type ClientConfig } from "./shared";

type Operations = {
  describe_table: [DescribeTableCommandInput, DescribeTableCommandOutput];
  create_table: [CreateTableCommandInput, CreateTableCommandOutput];
};

export type DynamoDBApi = {
  readonly [K in keyof Operations]: (input: Operations[K][0]) => Promise<Operations[K][1]>;
};

export class DynamoDBClient extends Context.Tag("DynamoDBClient")<DynamoDBClient, DynamoDBApi>() {}

export class DynamoDBError extends Data.TaggedError("DynamoDBError")<{
  operation: keyof Operations;
  cause: unknown;
}> {
  is(name: string): boolean {
    return errorName(this.cause) === name;
  }
}

export const make = <K extends keyof Operations>(operation: K, input: Operations[K][0]) =>
  Effect.flatMap(DynamoDBClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new DynamoDBError({ operation, cause }),
    })
  );

export const layer = (config: ClientConfig) =>
  Layer.sync(DynamoDBClient, () => {
    const client = new SdkDynamoDBClient(toSdkConfig(config));
    return {
      describe_table: input => client.send(new DescribeTableCommand(input)),
      create_table: input => client.send(new CreateTableCommand(input)),
    };
  });
