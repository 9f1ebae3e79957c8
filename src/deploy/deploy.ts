import { Effect } from "effect";
import type {
  AwsClients,
  BucketIdentity,
  TableIdentity,
  ApiIdentity,
  FunctionIdentity,
  QueueIdentity,
  MappingIdentity,
  DeploymentRecord,
} from "~/aws";
import { deploymentVariables, type DeploySettings, type ImageServiceConfig } from "~/config";
import { packageFunction } from "~/build/bundle";
import { ensureBucket, ensureTable } from "./storage";
import { ensureApi, waitForApi, findRootResource } from "./api";
import { ensureRoute, type RouteResult } from "./routes";
import { buildEnvironment } from "./environment";
import { deployFunction, updateCode, type PackageCode } from "./functions";
import { ensureQueue, ensureQueuePolicy, ensureBucketNotification, ensureEventSourceMapping } from "./events";
import { publishApi } from "./publish";
import { functionsOf, validateConfig } from "./resolve-config";
import { inStep, type Converged, type StepRecord, type StepStatus } from "./shared";
import type { StepFailed } from "./errors";

export type DeployImageServiceInput = {
  config: ImageServiceConfig;
  settings: DeploySettings;
  /** Defaults to bundling each function's entry from `projectDir` */
  packageCode?: PackageCode;
  projectDir?: string;
};

export type DeployReport = {
  bucket: BucketIdentity;
  table: TableIdentity;
  api: ApiIdentity;
  functions: Record<string, FunctionIdentity>;
  routes: RouteResult[];
  queue: QueueIdentity;
  mapping: MappingIdentity;
  deployment: DeploymentRecord;
  url: string;
  steps: StepRecord[];
};

/**
 * Converges the whole service, one step at a time, in dependency order:
 * storage, API, functions with their routes, event wiring, then a new
 * deployment of the stage. The first failing step stops the run.
 */
export const deployImageService = (input: DeployImageServiceInput): Effect.Effect<DeployReport, StepFailed, AwsClients> =>
  Effect.gen(function* () {
    const { config, settings } = input;
    const packageCode = input.packageCode ?? packageFunction(input.projectDir ?? process.cwd());
    const variables = deploymentVariables(config, settings);
    const steps: StepRecord[] = [];

    const record = (step: string, key: string, status: StepStatus) => {
      steps.push({ step, key, status });
    };
    const track = <T>(step: string, key: string, result: Converged<T>): T => {
      record(step, key, result.status);
      return result.identity;
    };

    const routes = yield* validateConfig(config).pipe(inStep("configuration", "image-service"));

    // ============ Storage ============

    const bucket = track("bucket", config.bucket,
      yield* ensureBucket(config.bucket, settings.region).pipe(inStep("bucket", config.bucket)));

    const table = track("table", config.table.name,
      yield* ensureTable(config.table).pipe(inStep("table", config.table.name)));

    // ============ API ============

    const api = track("api", config.api.name,
      yield* ensureApi(config.api.name, config.api.description).pipe(inStep("api", config.api.name)));

    const resources = yield* waitForApi(api.id, config.readiness).pipe(inStep("readiness", api.id));
    const root = yield* findRootResource(api.id, resources).pipe(inStep("root-resource", api.id));

    // ============ Functions and routes ============

    const functions: Record<string, FunctionIdentity> = {};
    const routeResults: RouteResult[] = [];

    for (const [name, fn] of functionsOf(config)) {
      const environment = yield* buildEnvironment(name, config, variables).pipe(inStep("environment", name));
      const code = yield* packageCode(name, fn).pipe(inStep("package", name));

      functions[name] = track("function", name,
        yield* deployFunction({ name, code, environment, lambda: config.lambda }).pipe(inStep("function", name)));

      const route = routes.find(r => r.functionName === name);
      if (!route) continue;

      const routeKey = `${route.method} /${route.path}`;
      const result = yield* ensureRoute({ apiId: api.id, rootId: root.id, route, settings }).pipe(
        inStep("route", routeKey)
      );
      record("resource", routeKey, result.parts.resource);
      record("method", routeKey, result.parts.method);
      record("integration", routeKey, result.parts.integration);
      record("permission", routeKey, result.parts.permission);
      routeResults.push(result);
    }

    // ============ Event wiring ============

    const queue = track("queue", config.queue.name,
      yield* ensureQueue(config.queue.name).pipe(inStep("queue", config.queue.name)));

    record("queue-policy", queue.name,
      yield* ensureQueuePolicy(queue, bucket).pipe(inStep("queue-policy", queue.name)));

    record("notification", bucket.name,
      yield* ensureBucketNotification(bucket, queue, config.queue.events).pipe(inStep("notification", bucket.name)));

    const consumer = config.queue.consumer;
    const mapping = track("event-source-mapping", consumer,
      yield* ensureEventSourceMapping({
        functionName: consumer,
        sourceArn: queue.arn,
        batchSize: config.queue.batchSize,
        startingPosition: config.queue.startingPosition,
      }).pipe(inStep("event-source-mapping", consumer)));

    // ============ Publish ============

    const published = yield* publishApi(api.id, config.api.stage, settings).pipe(inStep("deployment", config.api.stage));
    record("deployment", config.api.stage, "created");

    yield* Effect.logInfo(`Image service is live at ${published.url}`);

    return {
      bucket,
      table,
      api,
      functions,
      routes: routeResults,
      queue,
      mapping,
      deployment: published.record,
      url: published.url,
      steps,
    };
  });

export type UpdateFunctionCodeInput = {
  config: ImageServiceConfig;
  name: string;
  packageCode?: PackageCode;
  projectDir?: string;
};

/**
 * Uploads fresh code for one existing function; nothing else is touched.
 */
export const updateFunctionCode = (input: UpdateFunctionCodeInput): Effect.Effect<FunctionIdentity, StepFailed, AwsClients> =>
  updateCode(
    input.config,
    input.name,
    input.packageCode ?? packageFunction(input.projectDir ?? process.cwd())
  ).pipe(inStep("update-code", input.name));
