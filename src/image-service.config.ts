import { defineConfig } from "./config";

export default defineConfig({
  bucket: "image-service-root",

  table: {
    name: "ImagesMetadata",
    hashKey: "user_id",
    rangeKey: "image_id",
    billingMode: "PAY_PER_REQUEST",
  },

  api: {
    name: "image-service-api",
    description: "Image service API",
    stage: "local",
  },

  queue: {
    name: "image-events-queue",
    events: ["s3:ObjectCreated:*"],
    consumer: "s3_listener",
    batchSize: 10,
    startingPosition: "LATEST",
  },

  functions: {
    upload_images: {
      entry: "src/functions/upload-images.ts",
      route: { path: "uploadImages", method: "POST" },
      environment: { PRESIGN_EXP: "900", UPLOAD_LIMIT: "10485760" },
    },
    list_images: {
      entry: "src/functions/list-images.ts",
      route: { path: "listImages", method: "GET" },
      environment: { PRESIGN_EXP: "900", PAGE_SIZE: "10" },
    },
    delete_images: {
      entry: "src/functions/delete-images.ts",
      route: { path: "deleteImages", method: "DELETE" },
    },
    s3_listener: {
      entry: "src/functions/s3-listener.ts",
    },
  },

  environment: {
    BUCKET_NAME: "${ROOT_BUCKET}",
    TABLE_NAME: "${TABLE_NAME}",
    LOCALSTACK_ENDPOINT: "http://localstack:4566",
    AWS_REGION: "${REGION}",
  },

  lambda: {
    runtime: "nodejs20.x",
    handler: "index.handler",
    timeout: 15,
    roleArn: "arn:aws:iam::000000000000:role/lambda-role",
  },

  readiness: {
    attempts: 5,
    interval: "2 seconds",
  },
});
