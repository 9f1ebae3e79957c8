import { Effect } from "effect";
import type { FunctionConfig, HttpMethod, ImageServiceConfig } from "~/config";
import { ConfigurationError } from "./errors";

export type RouteBinding = {
  functionName: string;
  path: string;
  method: HttpMethod;
};

const PATH_SEGMENT = /^[A-Za-z0-9._~-]+$/;

/**
 * Functions in declaration order.
 */
export const functionsOf = (config: ImageServiceConfig): [string, FunctionConfig][] =>
  Object.entries(config.functions);

export const lookupFunction = (config: ImageServiceConfig, name: string): Effect.Effect<FunctionConfig, ConfigurationError> => {
  const fn = Object.hasOwn(config.functions, name) ? config.functions[name] : undefined;
  return fn
    ? Effect.succeed(fn)
    : Effect.fail(new ConfigurationError({ subject: name, reason: "no such function in the configuration" }));
};

/**
 * Checks the configuration before any control-plane call: single-segment
 * route paths, unique (method, path) pairs, and a queue consumer that is a
 * declared function without a route.
 */
export const validateConfig = (config: ImageServiceConfig): Effect.Effect<RouteBinding[], ConfigurationError> =>
  Effect.gen(function* () {
    const seen = new Map<string, string>();
    const routes: RouteBinding[] = [];

    for (const [functionName, fn] of functionsOf(config)) {
      if (!fn.route) continue;
      const { path, method } = fn.route;

      if (!PATH_SEGMENT.test(path)) {
        return yield* Effect.fail(new ConfigurationError({
          subject: functionName,
          reason: `route path "${path}" must be a single non-empty path segment`,
        }));
      }

      const routeKey = `${method} /${path}`;
      const owner = seen.get(routeKey);
      if (owner !== undefined) {
        return yield* Effect.fail(new ConfigurationError({
          subject: functionName,
          reason: `route ${routeKey} is already bound to ${owner}`,
        }));
      }
      seen.set(routeKey, functionName);
      routes.push({ functionName, path, method });
    }

    const consumer = yield* lookupFunction(config, config.queue.consumer);
    if (consumer.route) {
      return yield* Effect.fail(new ConfigurationError({
        subject: config.queue.consumer,
        reason: "the queue consumer must not have a route",
      }));
    }

    if (!Number.isInteger(config.readiness.attempts) || config.readiness.attempts < 1) {
      return yield* Effect.fail(new ConfigurationError({
        subject: "readiness",
        reason: `attempts must be a positive integer, got ${config.readiness.attempts}`,
      }));
    }

    return routes;
  });
