import { Context, Data, Effect, Layer } from "effect";
import {
  APIGatewayClient as SdkApiGatewayClient,
  GetRestApisCommand,
  CreateRestApiCommand,
  GetResourcesCommand,
  CreateResourceCommand,
  GetMethodCommand,
  PutMethodCommand,
  GetIntegrationCommand,
  PutIntegrationCommand,
  CreateDeploymentCommand,
  type GetRestApisCommandInput,
  type GetRestApisCommandOutput,
  type CreateRestApiCommandInput,
  type CreateRestApiCommandOutput,
  type GetResourcesCommandInput,
  type GetResourcesCommandOutput,
  type CreateResourceCommandInput,
  type CreateResourceCommandOutput,
  type GetMethodCommandInput,
  type GetMethodCommandOutput,
  type PutMethodCommandInput,
  type PutMethodCommandOutput,
  type GetIntegrationCommandInput,
  type GetIntegrationCommandOutput,
  type PutIntegrationCommandInput,
  type PutIntegrationCommandOutput,
  type CreateDeploymentCommandInput,
  type CreateDeploymentCommandOutput,
} from "@aws-sdk/client-api-gateway";
import { errorName, toSdkConfig, type ClientConfig } from "./shared";

type Operations = {
  get_rest_apis: [GetRestApisCommandInput, GetRestApisCommandOutput];
  create_rest_api: [CreateRestApiCommandInput, CreateRestApiCommandOutput];
  get_resources: [GetResourcesCommandInput, GetResourcesCommandOutput];
  create_resource: [CreateResourceCommandInput, CreateResourceCommandOutput];
  get_method: [GetMethodCommandInput, GetMethodCommandOutput];
  put_method: [PutMethodCommandInput, PutMethodCommandOutput];
  get_integration: [GetIntegrationCommandInput, GetIntegrationCommandOutput];
  put_integration: [PutIntegrationCommandInput, PutIntegrationCommandOutput];
  create_deployment: [CreateDeploymentCommandInput, CreateDeploymentCommandOutput];
};

export type ApiGatewayApi = {
  readonly [K in keyof Operations]: (input: Operations[K][0]) => Promise<Operations[K][1]>;
};

export class ApiGatewayClient extends Context.Tag("ApiGatewayClient")<ApiGatewayClient, ApiGatewayApi>() {}

export class ApiGatewayError extends Data.TaggedError("ApiGatewayError")<{
  operation: keyof Operations;
  cause: unknown;
}> {
  is(name: string): boolean {
    return errorName(this.cause) === name;
  }
}

export const make = <K extends keyof Operations>(operation: K, input: Operations[K][0]) =>
  Effect.flatMap(ApiGatewayClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new ApiGatewayError({ operation, cause }),
    })
  );

export const layer = (config: ClientConfig) =>
  Layer.sync(ApiGatewayClient, () => {
    const client = new SdkApiGatewayClient(toSdkConfig(config));
    return {
      get_rest_apis: input => client.send(new GetRestApisCommand(input)),
      create_rest_api: input => client.send(new CreateRestApiCommand(input)),
      get_resources: input => client.send(new GetResourcesCommand(input)),
      create_resource: input => client.send(new CreateResourceCommand(input)),
      get_method: input => client.send(new GetMethodCommand(input)),
      put_method: input => client.send(new PutMethodCommand(input)),
      get_integration: input => client.send(new GetIntegrationCommand(input)),
      put_integration: input => client.send(new PutIntegrationCommand(input)),
      create_deployment: input => client.send(new CreateDeploymentCommand(input)),
    };
  });
