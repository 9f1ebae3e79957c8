import { marshall, unmarshall } from "@aws-sdk/util-dynamodb";
import type { APIGatewayProxyResult } from "aws-lambda";
import {
  createLogger,
  dynamodbClient,
  errorResponse,
  messageOf,
  parsePayload,
  readSettings,
  respond,
  s3Client,
  textField,
  type RequestEvent,
} from "./shared";

const log = createLogger("delete_images");

const text = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === "string" && value !== "" ? value : undefined;
};

/**
 * DELETE /deleteImages
 *
 * Removes the metadata item and, for uploaded images, the stored object.
 */
export const handler = async (event: RequestEvent): Promise<APIGatewayProxyResult> => {
  const { bucket, table } = readSettings();

  try {
    const payload = parsePayload(event, { queryFallback: true });
    const userId = textField(payload, "user_id");
    const imageId = textField(payload, "image_id");

    if (!userId || !imageId) {
      log.warn("Missing required fields user_id or image_id");
      return errorResponse(400, "user_id and image_id are required");
    }

    const key = marshall({ user_id: userId, image_id: imageId });
    const found = await dynamodbClient().getItem({ TableName: table, Key: key, ConsistentRead: true });
    if (!found.Item) return errorResponse(404, "image not found");

    const item: Record<string, unknown> = unmarshall(found.Item);
    const filename = text(item, "filename");
    const s3Key = text(item, "s3_key") ?? text(item, "key") ??
      (filename ? `${userId}/${imageId}_${filename}` : null);
    const status = text(item, "status");

    let s3Deleted = true;
    if (s3Key && status === "UPLOADED") {
      s3Deleted = await s3Client().deleteObject({ Bucket: bucket, Key: s3Key }).then(
        () => true,
        (error: unknown) => {
          log.error(`Cannot delete object ${s3Key}`, error);
          return false;
        }
      );
    } else if (s3Key) {
      log.info(`Keeping object ${s3Key}, status is ${status ?? "unknown"}`);
      s3Deleted = false;
    }

    const ddbDeleted = await dynamodbClient().deleteItem({ TableName: table, Key: key }).then(
      () => true,
      (error: unknown) => {
        log.error(`Cannot delete item ${userId}/${imageId}`, error);
        return false;
      }
    );

    return respond(200, {
      image_id: imageId,
      user_id: userId,
      s3_key: s3Key,
      s3_deleted: s3Deleted,
      ddb_deleted: ddbDeleted,
    });
  } catch (error) {
    log.error("Unhandled error", error);
    return errorResponse(500, messageOf(error));
  }
};
