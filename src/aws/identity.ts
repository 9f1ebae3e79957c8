import { Option } from "effect";

// What control planes and their CLIs hand back instead of "nothing"
const SENTINELS = new Set(["", "None", "none", "null", "NULL"]);

/**
 * Normalises an identity returned by a control-plane query.
 * Missing, blank and sentinel values (`None`, `null`) mean "absent".
 */
export const presentIdentity = (value: string | null | undefined): Option.Option<string> => {
  if (value === null || value === undefined) return Option.none();
  const trimmed = value.trim();
  return SENTINELS.has(trimmed) ? Option.none() : Option.some(trimmed);
};

export type BucketIdentity = { name: string; arn: string };
export type TableIdentity = { name: string; arn: string };
export type ApiIdentity = { id: string; name: string };
export type ResourceIdentity = { id: string; path: string; parentId?: string };
export type FunctionIdentity = { name: string; arn: string };
export type QueueIdentity = { name: string; url: string; arn: string };
export type MappingIdentity = { uuid: string };
export type DeploymentRecord = { apiId: string; stageName: string; deploymentId: string };

export const bucketArn = (name: string) => `arn:aws:s3:::${name}`;

export const functionArn = (region: string, accountId: string, name: string) =>
  `arn:aws:lambda:${region}:${accountId}:function:${name}`;

export const integrationUri = (region: string, accountId: string, name: string) =>
  `arn:aws:apigateway:${region}:lambda:path/2015-03-31/functions/${functionArn(region, accountId, name)}/invocations`;

export const executeApiArn = (region: string, accountId: string, apiId: string, method: string, path: string) =>
  `arn:aws:execute-api:${region}:${accountId}:${apiId}/*/${method}/${path}`;

export const statementId = (apiId: string, resourceId: string, method: string) =>
  `apigw-invoke-${apiId}-${resourceId}-${method}`;
