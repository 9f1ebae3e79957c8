import { Effect, Either, ParseResult, Schema } from "effect";
import type { ImageServiceConfig } from "~/config";
import { ConfigurationError } from "./errors";
import { lookupFunction } from "./resolve-config";

/** Lambda caps the serialised environment at 4 KB */
export const MAX_ENVIRONMENT_BYTES = 4096;

const VARIABLE_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;

const EnvironmentDocument = Schema.Struct({
  Variables: Schema.Record({ key: Schema.String, value: Schema.String }),
}).pipe(
  Schema.filter(doc => {
    const invalid = Object.keys(doc.Variables).filter(key => !VARIABLE_NAME.test(key));
    return invalid.length === 0 || `invalid variable name(s): ${invalid.join(", ")}`;
  }),
  Schema.filter(doc => {
    const size = Buffer.byteLength(JSON.stringify(doc), "utf8");
    return size <= MAX_ENVIRONMENT_BYTES || `environment is ${size} bytes, limit is ${MAX_ENVIRONMENT_BYTES}`;
  })
);

export type EnvironmentDocument = typeof EnvironmentDocument.Type;

/**
 * Replaces `${NAME}` references with deployment variables.
 * Left carries the reason when a reference is unknown or unterminated.
 */
export const expandValue = (value: string, variables: Record<string, string>): Either.Either<string, string> => {
  let expanded = "";
  let cursor = 0;

  while (cursor < value.length) {
    const start = value.indexOf("${", cursor);
    if (start === -1) {
      expanded += value.slice(cursor);
      break;
    }

    const end = value.indexOf("}", start + 2);
    if (end === -1) return Either.left(`unterminated "\${" in "${value}"`);

    const name = value.slice(start + 2, end);
    const resolved = Object.hasOwn(variables, name) ? variables[name] : undefined;
    if (resolved === undefined) return Either.left(`unknown variable "${name}" in "${value}"`);

    expanded += value.slice(cursor, start) + resolved;
    cursor = end + 1;
  }

  return Either.right(expanded);
};

const expandAll = (subject: string, values: Record<string, string>, variables: Record<string, string>) =>
  Effect.gen(function* () {
    const result: Record<string, string> = {};
    for (const [key, raw] of Object.entries(values)) {
      result[key] = yield* Effect.mapError(
        expandValue(raw, variables),
        reason => new ConfigurationError({ subject, reason: `${key}: ${reason}` })
      );
    }
    return result;
  });

const describeParseError = (error: ParseResult.ParseError): string =>
  ParseResult.ArrayFormatter.formatErrorSync(error).map(issue => issue.message).join("; ");

/**
 * Environment of one function: deployment-wide variables overlaid with the
 * function's own, each expanded first, then validated.
 */
export const buildEnvironment = (
  functionName: string,
  config: ImageServiceConfig,
  variables: Record<string, string>
): Effect.Effect<EnvironmentDocument, ConfigurationError> =>
  Effect.gen(function* () {
    const fn = yield* lookupFunction(config, functionName);
    const base = yield* expandAll(functionName, config.environment, variables);
    const overrides = yield* expandAll(functionName, fn.environment ?? {}, variables);

    return yield* Schema.decodeUnknown(EnvironmentDocument)({ Variables: { ...base, ...overrides } }).pipe(
      Effect.mapError(error => new ConfigurationError({ subject: functionName, reason: describeParseError(error) }))
    );
  });
