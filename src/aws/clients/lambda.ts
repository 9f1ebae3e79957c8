import { Context, Data, Effect, Layer } from "effect";
import {
  LambdaClient as SdkLambdaClient,
  GetFunctionCommand,
  CreateFunctionCommand,
  UpdateFunctionCodeCommand,
  UpdateFunctionConfigurationCommand,
  GetPolicyCommand,
  AddPermissionCommand,
  ListEventSourceMappingsCommand,
  CreateEventSourceMappingCommand,
  type GetFunctionCommandInput,
  type GetFunctionCommandOutput,
  type CreateFunctionCommandInput,
  type CreateFunctionCommandOutput,
  type UpdateFunctionCodeCommandInput,
  type UpdateFunctionCodeCommandOutput,
  type UpdateFunctionConfigurationCommandInput,
  type UpdateFunctionConfigurationCommandOutput,
  type GetPolicyCommandInput,
  type GetPolicyCommandOutput,
  type AddPermissionCommandInput,
  type AddPermissionCommandOutput,
  type ListEventSourceMappingsCommandInput,
  type ListEventSourceMappingsCommandOutput,
  type CreateEventSourceMappingCommandInput,
  type CreateEventSourceMappingCommandOutput,
} from "@aws-sdk/client-lambda";
import { errorName, toSdkConfig, type ClientConfig } from "./shared";

type Operations = {
  get_function: [GetFunctionCommandInput, GetFunctionCommandOutput];
  create_function: [CreateFunctionCommandInput, CreateFunctionCommandOutput];
  update_function_code: [UpdateFunctionCodeCommandInput, UpdateFunctionCodeCommandOutput];
  update_function_configuration: [UpdateFunctionConfigurationCommandInput, UpdateFunctionConfigurationCommandOutput];
  get_policy: [GetPolicyCommandInput, GetPolicyCommandOutput];
  add_permission: [AddPermissionCommandInput, AddPermissionCommandOutput];
  list_event_source_mappings: [ListEventSourceMappingsCommandInput, ListEventSourceMappingsCommandOutput];
  create_event_source_mapping: [CreateEventSourceMappingCommandInput, CreateEventSourceMappingCommandOutput];
};

export type LambdaApi = {
  readonly [K in keyof Operations]: (input: Operations[K][0]) => Promise<Operations[K][1]>;
};

export class LambdaClient extends Context.Tag("LambdaClient")<LambdaClient, LambdaApi>() {}

export class LambdaError extends Data.TaggedError("LambdaError")<{
  operation: keyof Operations;
  cause: unknown;
}> {
  is(name: string): boolean {
    return errorName(this.cause) === name;
  }
}

export const make = <K extends keyof Operations>(operation: K, input: Operations[K][0]) =>
  Effect.flatMap(LambdaClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new LambdaError({ operation, cause }),
    })
  );

export const layer = (config: ClientConfig) =>
  Layer.sync(LambdaClient, () => {
    const client = new SdkLambdaClient(toSdkConfig(config));
    return {
      get_function: input => client.send(new GetFunctionCommand(input)),
      create_function: input => client.send(new CreateFunctionCommand(input)),
      update_function_code: input => client.send(new UpdateFunctionCodeCommand(input)),
      update_function_configuration: input => client.send(new UpdateFunctionConfigurationCommand(input)),
      get_policy: input => client.send(new GetPolicyCommand(input)),
      add_permission: input => client.send(new AddPermissionCommand(input)),
      list_event_source_mappings: input => client.send(new ListEventSourceMappingsCommand(input)),
      create_event_source_mapping: input => client.send(new CreateEventSourceMappingCommand(input)),
    };
  });
