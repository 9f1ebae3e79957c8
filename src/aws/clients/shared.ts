export type ClientConfig = {
  region: string;
  /** Custom control-plane endpoint, e.g. LocalStack's `http://localhost:4566` */
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
};

export const toSdkConfig = (config: ClientConfig) => ({
  region: config.region,
  ...(config.endpoint ? { endpoint: config.endpoint } : {}),
  ...(config.credentials ? { credentials: config.credentials } : {}),
});

/**
 * Name of an AWS SDK failure (`ResourceNotFoundException`, `NotFound`, ...).
 */
export const errorName = (cause: unknown): string | undefined =>
  cause instanceof Error ? cause.name : undefined;

/**
 * HTTP status code the SDK attached to a failure, if any.
 */
export const errorStatus = (cause: unknown): number | undefined => {
  if (typeof cause !== "object" || cause === null || !("$metadata" in cause)) return undefined;
  const metadata = cause.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
};

export const errorMessage = (cause: unknown): string =>
  cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
