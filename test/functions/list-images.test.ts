import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { marshall } from "@aws-sdk/util-dynamodb"

const mockQuery = vi.fn();
const mockGetSignedUrl = vi.fn();

vi.mock("@aws-sdk/client-dynamodb", () => ({
  DynamoDB: class {
    query = mockQuery;
  },
}));

vi.mock("@aws-sdk/client-s3", () => ({
  S3: class {},
  GetObjectCommand: class {
    constructor(readonly input: unknown) {}
  },
}));

vi.mock("@aws-sdk/s3-request-presigner", () => ({
  getSignedUrl: (...args: unknown[]) => mockGetSignedUrl(...args),
}));

import { handler, encodePageToken, decodePageToken } from "~/functions/list-images"

const get = (query: Record<string, string>) => ({ body: null, queryStringParameters: query })

const uploaded = marshall({
  user_id: "u1",
  image_id: "i1",
  filename: "a.png",
  content_type: "image/png",
  created_at: 1700000000,
  status: "UPLOADED",
  s3_key: "u1/i1_a.png",
  bucket: "stored-bucket",
})

const pending = marshall({
  user_id: "u1",
  image_id: "i2",
  filename: "b.png",
  status: "PENDING_UPLOAD",
  s3_key: "u1/i2_b.png",
})

describe("page tokens", () => {

  it("should decode what it encodes", () => {
    const key = { user_id: { S: "u1" }, image_id: { S: "i2" } }
    expect(decodePageToken(encodePageToken(key))).toEqual(key)
  })

  it("should reject tokens that are not a key", () => {
    expect(decodePageToken("not-a-token")).toBeUndefined()
    expect(decodePageToken(Buffer.from(JSON.stringify({ user_id: 1 })).toString("base64url"))).toBeUndefined()
  })

})

describe("list_images", () => {

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv("BUCKET_NAME", "test-bucket");
    vi.stubEnv("TABLE_NAME", "test-table");
    vi.stubEnv("PRESIGN_EXP", "900");
    vi.stubEnv("PAGE_SIZE", "10");
    vi.stubEnv("LOG_LEVEL", "error");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should list a user's images with GET URLs for uploaded ones", async () => {
    mockQuery.mockResolvedValueOnce({ Items: [uploaded, pending] });
    mockGetSignedUrl.mockResolvedValueOnce("https://signed.example/get");

    const response = await handler(get({ user_id: "u1" }));

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      items: [
        {
          image_id: "i1",
          filename: "a.png",
          content_type: "image/png",
          created_at: 1700000000,
          status: "UPLOADED",
          bucket: "stored-bucket",
          s3_key: "u1/i1_a.png",
          signed_url: "https://signed.example/get",
        },
        { image_id: "i2", filename: "b.png", content_type: null, created_at: null, status: "PENDING_UPLOAD" },
      ],
      count: 2,
      expires_in: 900,
    });
    expect(mockGetSignedUrl).toHaveBeenCalledTimes(1);
    expect(mockGetSignedUrl.mock.calls[0]?.[1]).toEqual({ input: { Bucket: "test-bucket", Key: "u1/i1_a.png" } });
  });

  it("should query by user with the filename and content type filters", async () => {
    mockQuery.mockResolvedValueOnce({ Items: [] });

    await handler(get({ user_id: "u1", filename: "a", content_type: "image/png" }));

    expect(mockQuery).toHaveBeenCalledWith({
      TableName: "test-table",
      KeyConditionExpression: "user_id = :uid",
      ExpressionAttributeValues: { ":uid": { S: "u1" }, ":fname": { S: "a" }, ":ctype": { S: "image/png" } },
      Limit: 10,
      FilterExpression: "contains(#fn, :fname) AND #ct = :ctype",
      ExpressionAttributeNames: { "#fn": "filename", "#ct": "content_type" },
    });
  });

  it("should continue from a page token and hand out the next one", async () => {
    const last = { user_id: { S: "u1" }, image_id: { S: "i2" } };
    mockQuery.mockResolvedValueOnce({ Items: [pending], LastEvaluatedKey: last });
    const start = { user_id: { S: "u1" }, image_id: { S: "i1" } };

    const response = await handler(get({ user_id: "u1", page_token: encodePageToken(start) }));

    expect(mockQuery.mock.calls[0]?.[0].ExclusiveStartKey).toEqual(start);
    expect(JSON.parse(response.body).next_page_token).toBe(encodePageToken(last));
  });

  it("should ignore an undecodable page token", async () => {
    mockQuery.mockResolvedValueOnce({ Items: [] });

    await handler(get({ user_id: "u1", page_token: "not-a-token" }));

    expect(mockQuery.mock.calls[0]?.[0]).not.toHaveProperty("ExclusiveStartKey");
  });

  it("should keep an item whose URL cannot be signed", async () => {
    mockQuery.mockResolvedValueOnce({ Items: [uploaded] });
    mockGetSignedUrl.mockRejectedValueOnce(new Error("no credentials"));

    const response = await handler(get({ user_id: "u1" }));

    expect(JSON.parse(response.body).items[0].signed_url).toBeNull();
  });

  it("should read the request from a JSON body too", async () => {
    mockQuery.mockResolvedValueOnce({ Items: [] });

    const response = await handler({ body: JSON.stringify({ user_id: "u7" }), queryStringParameters: null });

    expect(response.statusCode).toBe(200);
    expect(mockQuery.mock.calls[0]?.[0].ExpressionAttributeValues).toEqual({ ":uid": { S: "u7" } });
  });

  it("should require user_id", async () => {
    const response = await handler(get({}));

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({ error: "user_id is required" });
  });

});
