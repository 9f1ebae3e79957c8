import { DynamoDB } from "@aws-sdk/client-dynamodb";
import { S3 } from "@aws-sdk/client-s3";
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda";

// ============ Responses ============

export const respond = (status: number, body: unknown): APIGatewayProxyResult => ({
  statusCode: status,
  headers: { "Content-Type": "application/json" },
  body: JSON.stringify(body),
});

export const errorResponse = (status: number, error: string) => respond(status, { error });

// ============ Request payload ============

export type Payload = Record<string, unknown>;

export type RequestEvent = Pick<APIGatewayProxyEvent, "body" | "queryStringParameters">;

const isPayload = (value: unknown): value is Payload =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * JSON body of a proxy request. With `queryFallback`, an empty body falls
 * back to the query string. Malformed JSON throws.
 */
export const parsePayload = (event: RequestEvent, options: { queryFallback: boolean }): Payload => {
  const parsed: unknown = event.body ? JSON.parse(event.body) : {};
  const payload = isPayload(parsed) ? parsed : {};

  if (options.queryFallback && Object.keys(payload).length === 0) {
    return { ...(event.queryStringParameters ?? {}) };
  }
  return payload;
};

/** Non-empty string (or number) field of a payload. */
export const textField = (payload: Payload, key: string): string | undefined => {
  const value = payload[key];
  if (typeof value === "number") return String(value);
  return typeof value === "string" && value !== "" ? value : undefined;
};

// ============ Settings ============

const intFromEnv = (name: string, fallback: number): number => {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const readSettings = () => ({
  bucket: process.env.BUCKET_NAME || "image-service-root",
  table: process.env.TABLE_NAME || "ImagesMetadata",
  presignExpiry: intFromEnv("PRESIGN_EXP", 900),
  pageSize: intFromEnv("PAGE_SIZE", 10),
});

// ============ Clients ============

const clientConfig = () => {
  const endpoint = process.env.LOCALSTACK_ENDPOINT || undefined;
  return {
    region: process.env.AWS_REGION || "us-east-1",
    maxAttempts: 2,
    ...(endpoint ? { endpoint } : {}),
    credentials: {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "test",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "test",
    },
  };
};

let s3: S3 | null = null;
let dynamodb: DynamoDB | null = null;

// Lazily created, reused across warm invocations
export const s3Client = () => (s3 ??= new S3({ ...clientConfig(), forcePathStyle: true }));
export const dynamodbClient = () => (dynamodb ??= new DynamoDB(clientConfig()));

// ============ Logging ============

type Level = "debug" | "info" | "warn" | "error";

const LOG_RANK: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const thresholdFromEnv = (): number => {
  const level = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  if (level === "warning") return LOG_RANK.warn;
  return level === "debug" || level === "info" || level === "warn" || level === "error" ? LOG_RANK[level] : LOG_RANK.info;
};

export type Logger = Record<Level, (message: string, details?: unknown) => void>;

export const createLogger = (functionName: string): Logger => {
  const prefix = `[image-service:${functionName}]`;
  const at = (level: Level, write: (...args: unknown[]) => void) =>
    (message: string, details?: unknown) => {
      if (LOG_RANK[level] < thresholdFromEnv()) return;
      if (details === undefined) write(prefix, message);
      else write(prefix, message, details instanceof Error ? details.message : JSON.stringify(details));
    };

  return {
    debug: at("debug", console.debug),
    info: at("info", console.log),
    warn: at("warn", console.warn),
    error: at("error", console.error),
  };
};

export const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
