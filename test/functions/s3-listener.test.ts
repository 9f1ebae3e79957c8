import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { marshall } from "@aws-sdk/util-dynamodb"
import type { SQSEvent, SQSRecord } from "aws-lambda"

const mockUpdateItem = vi.fn();

vi.mock("@aws-sdk/client-dynamodb", () => ({
  DynamoDB: class {
    updateItem = mockUpdateItem;
  },
}));

vi.mock("@aws-sdk/client-s3", () => ({
  S3: class {},
}));

import { handler, parseObjectKey } from "~/functions/s3-listener"

const message = (body: string, index: number): SQSRecord => ({
  messageId: `m${index}`,
  receiptHandle: `r${index}`,
  body,
  attributes: {
    ApproximateReceiveCount: "1",
    SentTimestamp: "0",
    SenderId: "s3",
    ApproximateFirstReceiveTimestamp: "0",
  },
  messageAttributes: {},
  md5OfBody: "",
  eventSource: "aws:sqs",
  eventSourceARN: "arn:aws:sqs:us-east-1:000000000000:image-events-queue",
  awsRegion: "us-east-1",
})

const sqsEvent = (...bodies: string[]): SQSEvent => ({ Records: bodies.map(message) })

const objectCreated = (...keys: string[]) =>
  JSON.stringify({ Records: keys.map(key => ({ eventName: "ObjectCreated:Put", s3: { object: { key } } })) })

describe("parseObjectKey", () => {

  it("should split user and image id off the key", () => {
    expect(parseObjectKey("u1/abc_photo.png")).toEqual({ userId: "u1", imageId: "abc" })
  })

  it("should decode URL-encoded keys", () => {
    expect(parseObjectKey("user+one/abc_my%20photo.png")).toEqual({ userId: "user one", imageId: "abc" })
  })

  it("should reject keys without the expected layout", () => {
    expect(parseObjectKey(undefined)).toBeUndefined()
    expect(parseObjectKey("photo.png")).toBeUndefined()
    expect(parseObjectKey("u1/photo.png")).toBeUndefined()
    expect(parseObjectKey("/abc_photo.png")).toBeUndefined()
  })

  it("should reject keys with a malformed escape", () => {
    expect(parseObjectKey("u1/abc_100%.png")).toBeUndefined()
    expect(parseObjectKey("u1/abc_%E0%A4%A.png")).toBeUndefined()
  })

})

describe("s3_listener", () => {

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv("TABLE_NAME", "test-table");
    vi.stubEnv("LOG_LEVEL", "error");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should mark every created object's image as uploaded", async () => {
    mockUpdateItem.mockResolvedValue({});

    const response = await handler(sqsEvent(objectCreated("u1/i1_a.png", "u2/i2_b.png")));

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      processed: [
        { user_id: "u1", image_id: "i1", s3_key: "u1/i1_a.png", ddb_updated: true },
        { user_id: "u2", image_id: "i2", s3_key: "u2/i2_b.png", ddb_updated: true },
      ],
    });
    expect(mockUpdateItem).toHaveBeenCalledWith({
      TableName: "test-table",
      Key: marshall({ user_id: "u1", image_id: "i1" }),
      UpdateExpression: "SET #s = :st",
      ExpressionAttributeNames: { "#s": "status" },
      ExpressionAttributeValues: { ":st": { S: "UPLOADED" } },
      ReturnValues: "ALL_NEW",
    });
  });

  it("should report each failure without failing the batch", async () => {
    mockUpdateItem.mockRejectedValueOnce(new Error("throttled"));

    const response = await handler(sqsEvent("not json", objectCreated("flat.png"), objectCreated("u1/i1_a.png")));
    const { processed } = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(processed).toHaveLength(3);
    expect(Object.keys(processed[0])).toEqual(["error"]);
    expect(processed[1]).toEqual({ key: "flat.png", status: "skipped", reason: "parse_failed" });
    expect(processed[2]).toEqual({ user_id: "u1", image_id: "i1", s3_key: "u1/i1_a.png", ddb_updated: false });
  });

  it("should skip a malformed key and keep processing the message", async () => {
    mockUpdateItem.mockResolvedValue({});

    const response = await handler(sqsEvent(objectCreated("u1/bad_100%.png", "u1/good_a.png")));

    expect(JSON.parse(response.body)).toEqual({
      processed: [
        { key: "u1/bad_100%.png", status: "skipped", reason: "parse_failed" },
        { user_id: "u1", image_id: "good", s3_key: "u1/good_a.png", ddb_updated: true },
      ],
    });
    expect(mockUpdateItem).toHaveBeenCalledTimes(1);
  });

  it("should ignore messages that carry no records", async () => {
    const response = await handler(sqsEvent(JSON.stringify({ Event: "s3:TestEvent" })));

    expect(JSON.parse(response.body)).toEqual({ processed: [] });
    expect(mockUpdateItem).not.toHaveBeenCalled();
  });

});
