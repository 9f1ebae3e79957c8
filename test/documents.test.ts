import { describe, it, expect } from "vitest"

import {
  hasStatementId,
  allowsSource,
  queuePolicyForBucket,
  targetsQueue,
  otherDestinations,
  queueNotification,
} from "~/aws/documents"

const SID = "apigw-invoke-api1-res1-POST"
const BUCKET_ARN = "arn:aws:s3:::image-service-root"
const QUEUE_ARN = "arn:aws:sqs:us-east-1:000000000000:image-events-queue"

const policy = (statement: unknown) => JSON.stringify({ Version: "2012-10-17", Statement: statement })

describe("hasStatementId", () => {

  it("should answer from the text when the id does not occur at all", () => {
    expect(hasStatementId(policy([{ Sid: "other" }]), SID)).toEqual({ found: false, via: "substring" })
  })

  it("should find an exact Sid in a statement list", () => {
    expect(hasStatementId(policy([{ Sid: "other" }, { Sid: SID }]), SID)).toEqual({ found: true, via: "document" })
  })

  it("should accept a single statement object", () => {
    expect(hasStatementId(policy({ Sid: SID, Effect: "Allow" }), SID)).toEqual({ found: true, via: "document" })
  })

  it("should not match a longer Sid that merely contains the id", () => {
    expect(hasStatementId(policy([{ Sid: `${SID}-old` }]), SID)).toEqual({ found: false, via: "document" })
  })

  it("should fall back to the text match when the policy is not JSON", () => {
    expect(hasStatementId(`{ broken ${SID}`, SID)).toEqual({ found: true, via: "unparseable" })
  })

})

describe("allowsSource", () => {

  it("should accept the policy written for the bucket", () => {
    const written = queuePolicyForBucket(QUEUE_ARN, BUCKET_ARN)
    expect(allowsSource(written, BUCKET_ARN, "sqs:SendMessage")).toEqual({ found: true, via: "document" })
  })

  it("should answer from the text when the bucket ARN is absent", () => {
    const other = queuePolicyForBucket(QUEUE_ARN, "arn:aws:s3:::another-bucket")
    expect(allowsSource(other, BUCKET_ARN, "sqs:SendMessage")).toEqual({ found: false, via: "substring" })
  })

  it("should accept service wildcards, action lists and case-insensitive condition keys", () => {
    const doc = policy([{
      Effect: "Allow",
      Action: ["sqs:ReceiveMessage", "sqs:*"],
      Condition: { StringLike: { "AWS:SourceArn": ["arn:aws:s3:::x", BUCKET_ARN] } },
    }])
    expect(allowsSource(doc, BUCKET_ARN, "sqs:SendMessage").found).toBe(true)
  })

  it("should reject a Deny statement", () => {
    const doc = policy([{
      Effect: "Deny",
      Action: "sqs:SendMessage",
      Condition: { ArnEquals: { "aws:SourceArn": BUCKET_ARN } },
    }])
    expect(allowsSource(doc, BUCKET_ARN, "sqs:SendMessage")).toEqual({ found: false, via: "document" })
  })

  it("should reject a statement granting another action", () => {
    const doc = policy([{
      Effect: "Allow",
      Action: ["sqs:ReceiveMessage"],
      Condition: { ArnEquals: { "aws:SourceArn": BUCKET_ARN } },
    }])
    expect(allowsSource(doc, BUCKET_ARN, "sqs:SendMessage")).toEqual({ found: false, via: "document" })
  })

  it("should reject a policy that mentions the bucket outside a source condition", () => {
    const doc = policy([{ Effect: "Allow", Action: "sqs:SendMessage", Resource: BUCKET_ARN }])
    expect(allowsSource(doc, BUCKET_ARN, "sqs:SendMessage")).toEqual({ found: false, via: "document" })
  })

  it("should grant nothing when the policy is not JSON", () => {
    expect(allowsSource(`not json ${BUCKET_ARN}`, BUCKET_ARN, "sqs:SendMessage")).toEqual({ found: false, via: "unparseable" })
  })

})

describe("queuePolicyForBucket", () => {

  it("should allow S3 to send messages from the bucket only", () => {
    expect(JSON.parse(queuePolicyForBucket(QUEUE_ARN, BUCKET_ARN))).toEqual({
      Version: "2012-10-17",
      Statement: [{
        Sid: "AllowS3SendMessage",
        Effect: "Allow",
        Principal: "*",
        Action: "SQS:SendMessage",
        Resource: QUEUE_ARN,
        Condition: { ArnEquals: { "aws:SourceArn": BUCKET_ARN } },
      }],
    })
  })

})

describe("notification documents", () => {

  const existing = {
    QueueConfigurations: [
      { QueueArn: "arn:aws:sqs:us-east-1:000000000000:old-queue", Events: ["s3:ObjectRemoved:*" as const] },
    ],
    TopicConfigurations: [
      { TopicArn: "arn:aws:sns:us-east-1:000000000000:alerts", Events: ["s3:ObjectCreated:*" as const] },
    ],
  }

  it("should detect whether the queue is already a destination", () => {
    expect(targetsQueue(existing, QUEUE_ARN)).toBe(false)
    expect(targetsQueue(queueNotification(QUEUE_ARN, ["s3:ObjectCreated:*"]), QUEUE_ARN)).toBe(true)
  })

  it("should list the destinations a replacement would drop", () => {
    expect(otherDestinations(existing, QUEUE_ARN)).toEqual([
      "arn:aws:sqs:us-east-1:000000000000:old-queue",
      "arn:aws:sns:us-east-1:000000000000:alerts",
    ])
  })

  it("should build a document with the queue as the only destination", () => {
    expect(queueNotification(QUEUE_ARN, ["s3:ObjectCreated:*"])).toEqual({
      QueueConfigurations: [{ QueueArn: QUEUE_ARN, Events: ["s3:ObjectCreated:*"] }],
    })
  })

})
