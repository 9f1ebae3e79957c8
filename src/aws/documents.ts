import { Either, Schema } from "effect";
import type { Event as BucketEvent, NotificationConfiguration } from "@aws-sdk/client-s3";

// ============ IAM-style policy documents ============

const StringOrList = Schema.Union(Schema.String, Schema.Array(Schema.String));

const Statement = Schema.Struct({
  Sid: Schema.optional(Schema.String),
  Effect: Schema.optional(Schema.String),
  Action: Schema.optional(StringOrList),
  Condition: Schema.optional(
    Schema.Record({
      key: Schema.String,
      value: Schema.Record({ key: Schema.String, value: StringOrList }),
    })
  ),
});

const PolicyDocument = Schema.Struct({
  Statement: Schema.optional(Schema.Union(Schema.Array(Statement), Statement)),
});

type Statement = typeof Statement.Type;

const decodePolicy = Schema.decodeUnknownEither(Schema.parseJson(PolicyDocument));

const toList = (value: string | readonly string[] | undefined): readonly string[] =>
  value === undefined ? [] : typeof value === "string" ? [value] : value;

const isStatementList = (value: Statement | readonly Statement[]): value is readonly Statement[] =>
  Array.isArray(value);

// "Statement" may be a single object or a list
const statementsOf = (doc: typeof PolicyDocument.Type): readonly Statement[] => {
  const statement = doc.Statement;
  if (statement === undefined) return [];
  return isStatementList(statement) ? statement : [statement];
};

/**
 * How a policy question was answered: by the quick substring scan, by reading
 * the parsed document, or by the scan alone because the document did not parse.
 */
export type PolicyCheck = {
  readonly found: boolean;
  readonly via: "substring" | "document" | "unparseable";
};

const check = (found: boolean, via: PolicyCheck["via"]): PolicyCheck => ({ found, via });

/**
 * Does the policy contain a statement with this `Sid`?
 * A policy that does not parse falls back to the substring answer.
 */
export const hasStatementId = (policy: string, sid: string): PolicyCheck => {
  if (!policy.includes(sid)) return check(false, "substring");

  return Either.match(decodePolicy(policy), {
    onLeft: () => check(true, "unparseable"),
    onRight: doc => check(statementsOf(doc).some(s => s.Sid === sid), "document"),
  });
};

const SOURCE_ARN_OPERATORS = new Set(["ArnEquals", "ArnLike", "StringEquals", "StringLike"]);

const actionAllowed = (statement: Statement, action: string): boolean => {
  const wanted = action.toLowerCase();
  const serviceWildcard = `${wanted.split(":")[0]}:*`;
  return toList(statement.Action).some(a => {
    const candidate = a.toLowerCase();
    return candidate === wanted || candidate === serviceWildcard || candidate === "*";
  });
};

const conditionedOnSource = (statement: Statement, sourceArn: string): boolean =>
  Object.entries(statement.Condition ?? {}).some(([operator, entries]) =>
    SOURCE_ARN_OPERATORS.has(operator) &&
    Object.entries(entries).some(([key, value]) =>
      key.toLowerCase() === "aws:sourcearn" && toList(value).includes(sourceArn)
    )
  );

/**
 * Does the policy allow `action` for requests coming from `sourceArn`?
 * A policy that does not parse grants nothing.
 */
export const allowsSource = (policy: string, sourceArn: string, action: string): PolicyCheck => {
  if (!policy.includes(sourceArn)) return check(false, "substring");

  return Either.match(decodePolicy(policy), {
    onLeft: () => check(false, "unparseable"),
    onRight: doc => check(
      statementsOf(doc).some(s =>
        s.Effect === "Allow" && actionAllowed(s, action) && conditionedOnSource(s, sourceArn)
      ),
      "document"
    ),
  });
};

/**
 * Queue policy letting S3 deliver events from one bucket.
 */
export const queuePolicyForBucket = (queueArn: string, bucketArn: string): string =>
  JSON.stringify({
    Version: "2012-10-17",
    Statement: [
      {
        Sid: "AllowS3SendMessage",
        Effect: "Allow",
        Principal: "*",
        Action: "SQS:SendMessage",
        Resource: queueArn,
        Condition: { ArnEquals: { "aws:SourceArn": bucketArn } },
      },
    ],
  });

// ============ Bucket notification documents ============

export const targetsQueue = (config: NotificationConfiguration, queueArn: string): boolean =>
  (config.QueueConfigurations ?? []).some(q => q.QueueArn === queueArn);

/**
 * Destinations in the document other than `queueArn`; these are dropped
 * when the document is replaced.
 */
export const otherDestinations = (config: NotificationConfiguration, queueArn: string): string[] => [
  ...(config.QueueConfigurations ?? []).flatMap(q => q.QueueArn && q.QueueArn !== queueArn ? [q.QueueArn] : []),
  ...(config.TopicConfigurations ?? []).flatMap(t => t.TopicArn ? [t.TopicArn] : []),
  ...(config.LambdaFunctionConfigurations ?? []).flatMap(l => l.LambdaFunctionArn ? [l.LambdaFunctionArn] : []),
  ...(config.EventBridgeConfiguration ? ["eventbridge"] : []),
];

export const queueNotification = (queueArn: string, events: BucketEvent[]): NotificationConfiguration => ({
  QueueConfigurations: [{ QueueArn: queueArn, Events: events }],
});
