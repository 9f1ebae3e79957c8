import { describe, it, expect, beforeEach } from "vitest"

import { deployImageService, updateFunctionCode } from "~/deploy/deploy"
import { formatFailure } from "~/deploy/errors"
import { invokeUrl } from "~/deploy/publish"
import { FakeCloud, sdkError } from "./helpers/fake-cloud"
import { run, runFailure, settings, testConfig, fakePackage } from "./helpers/deployer"

const deploy = (config = testConfig()) => deployImageService({ config, settings, packageCode: fakePackage })

describe("deployImageService", () => {

  let cloud: FakeCloud

  beforeEach(() => {
    cloud = new FakeCloud()
  })

  it("should build the whole service on an empty account", async () => {
    const report = await run(cloud, deploy())

    expect(report.bucket.name).toBe("image-service-root")
    expect(report.table.arn).toBe("arn:aws:dynamodb:us-east-1:000000000000:table/ImagesMetadata")
    expect(report.api).toEqual({ id: "api0001", name: "image-service-api" })
    expect(Object.keys(report.functions)).toEqual(["upload_images", "list_images", "delete_images", "s3_listener"])
    expect(report.routes.map(r => `${r.method} ${r.path}`)).toEqual(["POST /uploadImages", "GET /listImages", "DELETE /deleteImages"])
    expect(report.deployment.stageName).toBe("local")
    expect(report.url).toBe("http://localhost:4566/restapis/api0001/local/_user_request_/")
    expect(report.steps.filter(s => s.status !== "created")).toEqual([])
  })

  it("should wire upload_images behind POST /uploadImages", async () => {
    const report = await run(cloud, deploy())
    const apiId = report.api.id

    const api = cloud.apis.get(apiId)
    expect(api?.resources.filter(r => r.path === "/uploadImages")).toHaveLength(1)

    const resource = cloud.resourceByPath(apiId, "/uploadImages")
    expect([...(resource?.methods.keys() ?? [])]).toEqual(["POST"])
    expect(resource?.methods.get("POST")?.integration).toEqual({
      type: "AWS_PROXY",
      uri: "arn:aws:apigateway:us-east-1:lambda:path/2015-03-31/functions/arn:aws:lambda:us-east-1:000000000000:function:upload_images/invocations",
    })
    expect(cloud.functions.get("upload_images")?.statements).toHaveLength(1)
  })

  it("should give every function its expanded environment", async () => {
    await run(cloud, deploy())

    expect(cloud.functions.get("list_images")?.environment).toEqual({
      BUCKET_NAME: "image-service-root",
      TABLE_NAME: "ImagesMetadata",
      LOCALSTACK_ENDPOINT: "http://localstack:4566",
      AWS_REGION: "us-east-1",
      PRESIGN_EXP: "900",
      PAGE_SIZE: "10",
    })
  })

  it("should connect the bucket to the listener through the queue", async () => {
    await run(cloud, deploy())
    const queueArn = "arn:aws:sqs:us-east-1:000000000000:image-events-queue"

    expect(cloud.buckets.get("image-service-root")).toEqual({
      QueueConfigurations: [{ QueueArn: queueArn, Events: ["s3:ObjectCreated:*"] }],
    })
    expect(cloud.mappings.map(m => [m.functionName, m.sourceArn])).toEqual([["s3_listener", queueArn]])
    expect(cloud.queues.get("image-events-queue")?.policy).toContain("arn:aws:s3:::image-service-root")
  })

  it("should only publish a new deployment when run again", async () => {
    const first = await run(cloud, deploy())
    const from = cloud.calls.length

    const second = await run(cloud, deploy())

    expect(cloud.creations(from)).toEqual(["apigateway:create_deployment"])
    expect(second.api).toEqual(first.api)
    expect(second.routes.map(r => r.resource.id)).toEqual(first.routes.map(r => r.resource.id))
    expect(second.mapping).toEqual(first.mapping)
    expect(cloud.apisNamed("image-service-api")).toHaveLength(1)
    expect(cloud.functions.get("upload_images")?.statements).toHaveLength(1)
    expect(second.steps.filter(s => s.status !== "unchanged").map(s => `${s.step}:${s.status}`)).toEqual([
      "function:updated",
      "function:updated",
      "function:updated",
      "function:updated",
      "deployment:created",
    ])
  })

  it("should adopt an API left by an earlier run", async () => {
    cloud.seedApi("image-service-api", { id: "existing1", createdDate: new Date("2024-01-01T00:00:00Z") })

    const report = await run(cloud, deploy())

    expect(report.api.id).toBe("existing1")
    expect(cloud.calls).not.toContain("apigateway:create_rest_api")
  })

  it("should stop at readiness without touching routes when the API never answers", async () => {
    cloud.failOn("apigateway:get_resources", sdkError("NotFoundException", "Invalid API identifier specified"))

    const failure = await runFailure(cloud, deploy())

    expect(failure.step).toBe("readiness")
    expect(failure.key).toBe("api0001")
    expect(failure.cause._tag).toBe("ReadinessTimeout")
    expect(formatFailure(failure)).toBe("✗ readiness failed for api0001: API api0001 not ready after 5 attempts")
    expect(cloud.calls).not.toContain("apigateway:create_resource")
    expect(cloud.calls).not.toContain("lambda:create_function")
  })

  it("should name the step and resource of a remote failure", async () => {
    cloud.failOn("sqs:create_queue", sdkError("AccessDenied", "not allowed"))

    const failure = await runFailure(cloud, deploy())

    expect(formatFailure(failure)).toBe("✗ queue failed for image-events-queue: create_queue on image-events-queue: AccessDenied: not allowed")
    expect(cloud.calls).not.toContain("apigateway:create_deployment")
  })

  it("should reject an invalid configuration before calling anything", async () => {
    const config = testConfig({
      functions: {
        upload_images: { entry: "src/functions/upload-images.ts", route: { path: "a/b", method: "POST" } },
        s3_listener: { entry: "src/functions/s3-listener.ts" },
      },
    })

    const failure = await runFailure(cloud, deploy(config))

    expect(failure.step).toBe("configuration")
    expect(failure.cause._tag).toBe("ConfigurationError")
    expect(cloud.calls).toEqual([])
  })

})

describe("updateFunctionCode", () => {

  it("should only push code to the named function", async () => {
    const cloud = new FakeCloud()
    await run(cloud, deploy())
    const from = cloud.calls.length

    await run(cloud, updateFunctionCode({ config: testConfig(), name: "delete_images", packageCode: fakePackage }))

    expect(cloud.callsSince(from)).toEqual(["lambda:get_function", "lambda:update_function_code", "lambda:get_function"])
  })

  it("should report a function that does not exist yet", async () => {
    const cloud = new FakeCloud()

    const failure = await runFailure(cloud, updateFunctionCode({ config: testConfig(), name: "delete_images", packageCode: fakePackage }))

    expect(formatFailure(failure)).toBe(
      "✗ update-code failed for delete_images: get_function on delete_images: Error: function does not exist, run deploy first"
    )
  })

})

describe("invokeUrl", () => {

  it("should use the LocalStack layout when an endpoint is set", () => {
    expect(invokeUrl("abc", "local", { ...settings, endpoint: "http://localhost:4566/" }))
      .toBe("http://localhost:4566/restapis/abc/local/_user_request_/")
  })

  it("should use the public execute-api host otherwise", () => {
    expect(invokeUrl("abc", "prod", { region: "eu-west-1", accountId: "000000000000" }))
      .toBe("https://abc.execute-api.eu-west-1.amazonaws.com/prod")
  })

})
