import { randomUUID } from "crypto";
import { PutObjectCommand } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { marshall } from "@aws-sdk/util-dynamodb";
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

const log = createLogger("upload_images");

/**
 * POST /uploadImages
 *
 * Body `{ user_id, filename, content_type? }`. Records the image as
 * `PENDING_UPLOAD` and returns a presigned PUT URL for the object.
 */
export const handler = async (event: RequestEvent): Promise<APIGatewayProxyResult> => {
  const { bucket, table, presignExpiry } = readSettings();

  try {
    const payload = parsePayload(event, { queryFallback: false });
    log.debug("Parsed payload", payload);

    const userId = textField(payload, "user_id");
    const filename = textField(payload, "filename");
    const contentType = textField(payload, "content_type") ?? "application/octet-stream";

    if (!userId || !filename) {
      log.warn("Missing required fields");
      return errorResponse(400, "user_id and filename are required");
    }

    const imageId = randomUUID();
    const key = `${userId}/${imageId}_${filename}`;

    const uploadUrl = await getSignedUrl(
      s3Client(),
      new PutObjectCommand({ Bucket: bucket, Key: key, ContentType: contentType }),
      { expiresIn: presignExpiry }
    );

    await dynamodbClient().putItem({
      TableName: table,
      Item: marshall({
        user_id: userId,
        image_id: imageId,
        filename,
        s3_key: key,
        bucket,
        content_type: contentType,
        status: "PENDING_UPLOAD",
        created_at: Math.floor(Date.now() / 1000),
      }),
    });
    log.info(`Pending upload ${key}`);

    return respond(200, {
      upload_url: uploadUrl,
      bucket,
      key,
      expires_in: presignExpiry,
      image_id: imageId,
    });
  } catch (error) {
    log.error("Unhandled error", error);
    return errorResponse(500, messageOf(error));
  }
};
