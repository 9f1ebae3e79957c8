import type { Duration } from "effect";
import type { Event as BucketEvent } from "@aws-sdk/client-s3";
import type { BillingMode } from "@aws-sdk/client-dynamodb";
import type { Runtime } from "@aws-sdk/client-lambda";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type RouteConfig = {
  /** Single path segment under the API root, without slashes (e.g. `uploadImages`) */
  path: string;
  method: HttpMethod;
};

export type FunctionConfig = {
  /** Source file of the function, relative to the project directory */
  entry: string;

  /** HTTP binding. Functions without a route are only reachable from the queue. */
  route?: RouteConfig;

  /**
   * Per-function variables merged over the deployment-wide ones.
   * Values may reference deployment variables as `${NAME}`.
   */
  environment?: Record<string, string>;
};

/**
 * Everything the deployer converges, declared once.
 *
 * @example
 * ```typescript
 * // src/image-service.config.ts
 * export default defineConfig({
 *   bucket: "image-service-root",
 *   functions: {
 *     upload_images: { entry: "src/functions/upload-images.ts", route: { path: "uploadImages", method: "POST" } },
 *   },
 *   ...
 * });
 * ```
 */
export type ImageServiceConfig = {
  bucket: string;

  table: {
    name: string;
    hashKey: string;
    rangeKey: string;
    billingMode: BillingMode;
  };

  api: {
    name: string;
    description: string;
    stage: string;
  };

  queue: {
    name: string;
    /** Bucket events delivered to the queue */
    events: BucketEvent[];
    /** Function consuming the queue; must be declared in `functions` without a route */
    consumer: string;
    batchSize: number;
    startingPosition: "LATEST" | "TRIM_HORIZON";
  };

  /** Deployed in declaration order */
  functions: Record<string, FunctionConfig>;

  /** Variables every function receives */
  environment: Record<string, string>;

  lambda: {
    runtime: Runtime;
    handler: string;
    /** Seconds */
    timeout: number;
    roleArn: string;
  };

  /** Polling of a freshly created API before its resources are touched */
  readiness: {
    attempts: number;
    interval: Duration.DurationInput;
  };
};

/**
 * Helper for type-safe configuration. Returns the config object as-is.
 */
export const defineConfig = (config: ImageServiceConfig): ImageServiceConfig => config;

// ============ Settings from the environment ============

export type DeploySettings = {
  region: string;
  /** Control-plane endpoint; unset means the real AWS endpoints */
  endpoint?: string;
  accountId: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
};

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_ENDPOINT = "http://localhost:4566";
export const DEFAULT_ACCOUNT_ID = "000000000000";

/**
 * Reads region, endpoint, account and credentials from the environment.
 * `AWS_ENDPOINT_URL=""` targets real AWS with the SDK's default credential chain.
 */
export const resolveSettings = (env: NodeJS.ProcessEnv = process.env): DeploySettings => {
  const region = env.AWS_REGION || DEFAULT_REGION;
  const endpoint = env.AWS_ENDPOINT_URL === undefined ? DEFAULT_ENDPOINT : env.AWS_ENDPOINT_URL.trim();
  const accountId = env.AWS_ACCOUNT_ID || DEFAULT_ACCOUNT_ID;

  if (!endpoint) return { region, accountId };

  return {
    region,
    endpoint,
    accountId,
    credentials: {
      accessKeyId: env.AWS_ACCESS_KEY_ID || "test",
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || "test",
    },
  };
};

/**
 * Names available to `${NAME}` references in environment values.
 */
export const deploymentVariables = (config: ImageServiceConfig, settings: DeploySettings): Record<string, string> => ({
  ROOT_BUCKET: config.bucket,
  TABLE_NAME: config.table.name,
  REGION: settings.region,
  API_NAME: config.api.name,
  QUEUE_NAME: config.queue.name,
  STAGE: config.api.stage,
  ENDPOINT: settings.endpoint ?? "",
});
