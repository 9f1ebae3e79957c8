import { Effect, Option } from "effect";
import {
  probeResource,
  probeMethod,
  probeIntegration,
  probeFunctionPolicy,
  createResource,
  putMethod,
  putIntegration,
  addPermission,
  hasStatementId,
  integrationUri,
  executeApiArn,
  statementId,
  type ResourceIdentity,
  type PermissionGrant,
} from "~/aws";
import type { DeploySettings } from "~/config";
import type { RouteBinding } from "./resolve-config";
import { adoptExisting, converged, type StepStatus } from "./shared";

export type RouteInput = {
  apiId: string;
  rootId: string;
  route: RouteBinding;
  settings: DeploySettings;
};

export type RouteResult = {
  functionName: string;
  method: string;
  path: string;
  resource: ResourceIdentity;
  parts: {
    resource: StepStatus;
    method: StepStatus;
    integration: StepStatus;
    permission: StepStatus;
  };
};

export const ensureResource = (apiId: string, rootId: string, pathPart: string) =>
  Effect.gen(function* () {
    const existing = yield* probeResource(apiId, `/${pathPart}`);

    if (Option.isSome(existing)) {
      yield* Effect.logDebug(`Resource /${pathPart} already exists (${existing.value.id})`);
      return converged(existing.value, "unchanged");
    }

    yield* Effect.logInfo(`Creating resource /${pathPart}...`);
    return yield* createResource(apiId, rootId, pathPart).pipe(
      Effect.map(created => converged(created, "created")),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(conflict, probeResource(apiId, `/${pathPart}`)).pipe(
          Effect.map(found => converged(found, "unchanged"))
        )
      )
    );
  });

export const ensureMethod = (apiId: string, resourceId: string, httpMethod: string) =>
  Effect.gen(function* () {
    const existing = yield* probeMethod(apiId, resourceId, httpMethod);
    if (Option.isSome(existing)) return "unchanged" as const;

    yield* Effect.logInfo(`Adding method ${httpMethod}...`);
    return yield* putMethod(apiId, resourceId, httpMethod).pipe(
      Effect.as("created" as const),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(conflict, probeMethod(apiId, resourceId, httpMethod)).pipe(Effect.as("unchanged" as const))
      )
    );
  });

export const ensureIntegration = (apiId: string, resourceId: string, httpMethod: string, uri: string) =>
  Effect.gen(function* () {
    const existing = yield* probeIntegration(apiId, resourceId, httpMethod);

    if (Option.isSome(existing)) {
      if (existing.value.uri !== undefined && existing.value.uri !== uri) {
        yield* Effect.logWarning(`Integration of ${httpMethod} points at ${existing.value.uri}, leaving it as is`);
      }
      return "unchanged" as const;
    }

    yield* Effect.logInfo(`Adding ${httpMethod} integration...`);
    yield* putIntegration(apiId, resourceId, httpMethod, uri);
    return "created" as const;
  });

/**
 * Grants the API permission to invoke the function, once per statement id.
 */
export const ensurePermission = (grant: PermissionGrant) =>
  Effect.gen(function* () {
    const policy = yield* probeFunctionPolicy(grant.functionName);

    if (Option.isSome(policy)) {
      const check = hasStatementId(policy.value, grant.statementId);
      if (check.via === "unparseable") {
        yield* Effect.logWarning(`Policy of ${grant.functionName} is not valid JSON, relying on a text match`);
      }
      if (check.found) return "unchanged" as const;
    }

    yield* Effect.logInfo(`Granting invoke permission ${grant.statementId}...`);
    return yield* addPermission(grant).pipe(
      Effect.as("created" as const),
      Effect.catchTag("CreationConflict", conflict =>
        adoptExisting(
          conflict,
          probeFunctionPolicy(grant.functionName).pipe(
            Effect.map(found => Option.filter(found, policy => hasStatementId(policy, grant.statementId).found))
          )
        ).pipe(Effect.as("unchanged" as const))
      )
    );
  });

/**
 * Binds one function to `METHOD /path`: resource, method, integration and
 * invoke permission are each checked and created independently.
 */
export const ensureRoute = ({ apiId, rootId, route, settings }: RouteInput) =>
  Effect.gen(function* () {
    const { region, accountId } = settings;
    const { functionName, method, path } = route;

    const resource = yield* ensureResource(apiId, rootId, path);
    const resourceId = resource.identity.id;

    const methodStatus = yield* ensureMethod(apiId, resourceId, method);
    const integrationStatus = yield* ensureIntegration(
      apiId,
      resourceId,
      method,
      integrationUri(region, accountId, functionName)
    );
    const permissionStatus = yield* ensurePermission({
      functionName,
      statementId: statementId(apiId, resourceId, method),
      action: "lambda:InvokeFunction",
      principal: "apigateway.amazonaws.com",
      sourceArn: executeApiArn(region, accountId, apiId, method, path),
    });

    const result: RouteResult = {
      functionName,
      method,
      path: `/${path}`,
      resource: resource.identity,
      parts: {
        resource: resource.status,
        method: methodStatus,
        integration: integrationStatus,
        permission: permissionStatus,
      },
    };
    return result;
  });
