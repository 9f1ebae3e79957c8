import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { unmarshall } from "@aws-sdk/util-dynamodb"

const mockPutItem = vi.fn();
const mockGetSignedUrl = vi.fn();

vi.mock("@aws-sdk/client-dynamodb", () => ({
  DynamoDB: class {
    putItem = mockPutItem;
  },
}));

vi.mock("@aws-sdk/client-s3", () => ({
  S3: class {},
  PutObjectCommand: class {
    constructor(readonly input: unknown) {}
  },
}));

vi.mock("@aws-sdk/s3-request-presigner", () => ({
  getSignedUrl: (...args: unknown[]) => mockGetSignedUrl(...args),
}));

import { handler } from "~/functions/upload-images"

const post = (body: unknown) => ({ body: JSON.stringify(body), queryStringParameters: null })

describe("upload_images", () => {

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv("BUCKET_NAME", "test-bucket");
    vi.stubEnv("TABLE_NAME", "test-table");
    vi.stubEnv("PRESIGN_EXP", "300");
    vi.stubEnv("LOG_LEVEL", "error");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should return a presigned PUT URL and record a pending upload", async () => {
    mockGetSignedUrl.mockResolvedValueOnce("https://signed.example/put");
    mockPutItem.mockResolvedValueOnce({});

    const response = await handler(post({ user_id: "u1", filename: "cat.png", content_type: "image/png" }));
    const body = JSON.parse(response.body);
    const key = `u1/${body.image_id}_cat.png`;

    expect(response.statusCode).toBe(200);
    expect(body).toEqual({
      upload_url: "https://signed.example/put",
      bucket: "test-bucket",
      key,
      expires_in: 300,
      image_id: body.image_id,
    });
    expect(body.image_id).toMatch(/^[0-9a-f-]{36}$/);

    expect(mockGetSignedUrl.mock.calls[0]?.[1]).toEqual({
      input: { Bucket: "test-bucket", Key: key, ContentType: "image/png" },
    });
    expect(mockGetSignedUrl.mock.calls[0]?.[2]).toEqual({ expiresIn: 300 });

    const put = mockPutItem.mock.calls[0]?.[0];
    expect(put.TableName).toBe("test-table");
    expect(unmarshall(put.Item)).toEqual({
      user_id: "u1",
      image_id: body.image_id,
      filename: "cat.png",
      s3_key: key,
      bucket: "test-bucket",
      content_type: "image/png",
      status: "PENDING_UPLOAD",
      created_at: expect.any(Number),
    });
  });

  it("should default the content type", async () => {
    mockGetSignedUrl.mockResolvedValueOnce("https://signed.example/put");
    mockPutItem.mockResolvedValueOnce({});

    await handler(post({ user_id: "u1", filename: "notes.bin" }));

    expect(mockGetSignedUrl.mock.calls[0]?.[1].input.ContentType).toBe("application/octet-stream");
  });

  it("should reject a request without user_id or filename", async () => {
    const response = await handler(post({ filename: "cat.png" }));

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({ error: "user_id and filename are required" });
    expect(mockPutItem).not.toHaveBeenCalled();
  });

  it("should answer 500 when the metadata write fails", async () => {
    mockGetSignedUrl.mockResolvedValueOnce("https://signed.example/put");
    mockPutItem.mockRejectedValueOnce(new Error("table unavailable"));

    const response = await handler(post({ user_id: "u1", filename: "cat.png" }));

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({ error: "table unavailable" });
  });

  it("should answer 500 on a malformed body", async () => {
    const response = await handler({ body: "{", queryStringParameters: null });

    expect(response.statusCode).toBe(500);
    expect(response.headers).toEqual({ "Content-Type": "application/json" });
  });

});
