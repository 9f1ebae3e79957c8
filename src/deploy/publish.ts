import { Effect } from "effect";
import { createDeployment } from "~/aws";
import type { DeploySettings } from "~/config";

/**
 * Public base URL of a deployed stage. LocalStack serves it under
 * `/restapis/<id>/<stage>/_user_request_/`.
 */
export const invokeUrl = (apiId: string, stageName: string, settings: DeploySettings): string =>
  settings.endpoint
    ? `${settings.endpoint.replace(/\/+$/, "")}/restapis/${apiId}/${stageName}/_user_request_/`
    : `https://${apiId}.execute-api.${settings.region}.amazonaws.com/${stageName}`;

/**
 * Snapshots the API into the stage. Runs on every deployment.
 */
export const publishApi = (apiId: string, stageName: string, settings: DeploySettings) =>
  Effect.gen(function* () {
    yield* Effect.logInfo(`Publishing stage ${stageName}...`);
    const record = yield* createDeployment(apiId, stageName);
    return { record, url: invokeUrl(apiId, stageName, settings) };
  });
