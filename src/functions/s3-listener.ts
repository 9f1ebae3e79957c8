import { marshall } from "@aws-sdk/util-dynamodb";
import type { APIGatewayProxyResult, S3Event, SQSEvent } from "aws-lambda";
import { createLogger, dynamodbClient, errorResponse, messageOf, readSettings, respond } from "./shared";

const log = createLogger("s3_listener");

const decodeKey = (rawKey: string): string | undefined => {
  try {
    return decodeURIComponent(rawKey.replace(/\+/g, " "));
  } catch (error) {
    if (error instanceof URIError) return undefined;
    throw error;
  }
};

/**
 * `<user_id>/<image_id>_<filename>` from an event's (URL-encoded) object key.
 * A key with a malformed escape does not parse.
 */
export const parseObjectKey = (rawKey: string | undefined): { userId: string; imageId: string } | undefined => {
  if (!rawKey) return undefined;
  const key = decodeKey(rawKey);
  if (key === undefined) return undefined;

  const slash = key.indexOf("/");
  if (slash === -1) return undefined;
  const userId = key.slice(0, slash);
  const tail = key.slice(slash + 1);

  const underscore = tail.indexOf("_");
  if (underscore === -1) return undefined;
  const imageId = tail.slice(0, underscore);

  return userId && imageId ? { userId, imageId } : undefined;
};

type Processed =
  | { user_id: string; image_id: string; s3_key: string; ddb_updated: boolean }
  | { key: string | null; status: "skipped"; reason: "parse_failed" }
  | { error: string };

const markUploaded = async (table: string, userId: string, imageId: string): Promise<boolean> =>
  dynamodbClient().updateItem({
    TableName: table,
    Key: marshall({ user_id: userId, image_id: imageId }),
    UpdateExpression: "SET #s = :st",
    ExpressionAttributeNames: { "#s": "status" },
    ExpressionAttributeValues: { ":st": { S: "UPLOADED" } },
    ReturnValues: "ALL_NEW",
  }).then(
    () => true,
    (error: unknown) => {
      log.error(`Cannot mark ${userId}/${imageId} uploaded`, error);
      return false;
    }
  );

const s3RecordsOf = (body: string): S3Event["Records"] => {
  const parsed: unknown = JSON.parse(body);
  if (typeof parsed !== "object" || parsed === null || !("Records" in parsed) || !Array.isArray(parsed.Records)) {
    return [];
  }
  const records: S3Event["Records"] = parsed.Records;
  return records;
};

/**
 * Queue consumer: every object-created event marks its image `UPLOADED`.
 * Failures are reported per record and never fail the batch.
 */
export const handler = async (event: SQSEvent): Promise<APIGatewayProxyResult> => {
  const { table } = readSettings();
  const processed: Processed[] = [];

  try {
    for (const message of event.Records ?? []) {
      try {
        for (const record of s3RecordsOf(message.body)) {
          const key = record.s3?.object?.key;
          const parsed = parseObjectKey(key);

          if (!parsed) {
            log.warn(`Cannot parse user_id/image_id from key ${key ?? "<none>"}, skipping`);
            processed.push({ key: key ?? null, status: "skipped", reason: "parse_failed" });
            continue;
          }

          const updated = await markUploaded(table, parsed.userId, parsed.imageId);
          processed.push({ user_id: parsed.userId, image_id: parsed.imageId, s3_key: key ?? "", ddb_updated: updated });
        }
      } catch (error) {
        log.error("Failed processing queue message", error);
        processed.push({ error: messageOf(error) });
      }
    }

    return respond(200, { processed });
  } catch (error) {
    log.error("Unhandled error", error);
    return errorResponse(500, messageOf(error));
  }
};
