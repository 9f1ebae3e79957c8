import { GetObjectCommand } from "@aws-sdk/client-s3";
import type { AttributeValue, QueryCommandInput } from "@aws-sdk/client-dynamodb";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { unmarshall } from "@aws-sdk/util-dynamodb";
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

const log = createLogger("list_images");

type KeyMap = Record<string, AttributeValue>;

const isKeyAttribute = (value: unknown): value is AttributeValue =>
  typeof value === "object" && value !== null &&
  (("S" in value && typeof value.S === "string") || ("N" in value && typeof value.N === "string"));

const isKeyMap = (value: unknown): value is KeyMap =>
  typeof value === "object" && value !== null && !Array.isArray(value) &&
  Object.keys(value).length > 0 && Object.values(value).every(isKeyAttribute);

/** Opaque pagination token: base64url of the last evaluated key. */
export const encodePageToken = (key: KeyMap): string =>
  Buffer.from(JSON.stringify(key)).toString("base64url");

export const decodePageToken = (token: string): KeyMap | undefined => {
  try {
    const decoded: unknown = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
    return isKeyMap(decoded) ? decoded : undefined;
  } catch {
    return undefined;
  }
};

const text = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === "string" && value !== "" ? value : undefined;
};

/**
 * GET /listImages
 *
 * `user_id` is required; `filename` (substring), `content_type` (exact) and
 * `page_token` narrow or continue the listing. Uploaded images carry a
 * presigned GET URL.
 */
export const handler = async (event: RequestEvent): Promise<APIGatewayProxyResult> => {
  const { bucket, table, presignExpiry, pageSize } = readSettings();

  try {
    const payload = parsePayload(event, { queryFallback: true });
    log.debug("Parsed payload", payload);

    const userId = textField(payload, "user_id");
    if (!userId) {
      log.warn("Missing required field: user_id");
      return errorResponse(400, "user_id is required");
    }

    const filenameFilter = textField(payload, "filename");
    const contentTypeFilter = textField(payload, "content_type");
    const pageToken = textField(payload, "page_token");

    const names: Record<string, string> = {};
    const values: KeyMap = { ":uid": { S: userId } };
    const filters: string[] = [];

    if (filenameFilter) {
      names["#fn"] = "filename";
      values[":fname"] = { S: filenameFilter };
      filters.push("contains(#fn, :fname)");
    }
    if (contentTypeFilter) {
      names["#ct"] = "content_type";
      values[":ctype"] = { S: contentTypeFilter };
      filters.push("#ct = :ctype");
    }

    const startKey = pageToken ? decodePageToken(pageToken) : undefined;
    if (pageToken && !startKey) log.warn("Ignoring undecodable page_token");

    const query: QueryCommandInput = {
      TableName: table,
      KeyConditionExpression: "user_id = :uid",
      ExpressionAttributeValues: values,
      Limit: pageSize,
      ...(filters.length > 0 ? { FilterExpression: filters.join(" AND "), ExpressionAttributeNames: names } : {}),
      ...(startKey ? { ExclusiveStartKey: startKey } : {}),
    };

    const result = await dynamodbClient().query(query);
    log.debug(`Query returned ${result.Items?.length ?? 0} item(s)`);

    const items: Record<string, unknown>[] = [];
    for (const raw of result.Items ?? []) {
      const record: Record<string, unknown> = unmarshall(raw);
      const status = text(record, "status");
      const key = text(record, "s3_key") ?? text(record, "key");

      const base = {
        image_id: record.image_id ?? null,
        filename: record.filename ?? null,
        content_type: record.content_type ?? null,
        created_at: record.created_at ?? null,
        status: status ?? null,
      };

      if (status !== "UPLOADED" || !key) {
        items.push(base);
        continue;
      }

      const signedUrl = await getSignedUrl(
        s3Client(),
        new GetObjectCommand({ Bucket: bucket, Key: key }),
        { expiresIn: presignExpiry }
      ).catch((error: unknown) => {
        log.error(`Cannot presign GET for ${key}`, error);
        return null;
      });

      items.push({ ...base, bucket: text(record, "bucket") ?? bucket, s3_key: key, signed_url: signedUrl });
    }

    return respond(200, {
      items,
      count: items.length,
      expires_in: presignExpiry,
      ...(result.LastEvaluatedKey ? { next_page_token: encodePageToken(result.LastEvaluatedKey) } : {}),
    });
  } catch (error) {
    log.error("Unhandled error", error);
    return errorResponse(500, messageOf(error));
  }
};
