import { Command } from "@effect/cli";
import { Console, Effect } from "effect";

import config from "~/image-service.config";
import { resolveSettings } from "~/config";
import { makeClients } from "~/aws";
import { deployImageService, type DeployReport } from "~/deploy/deploy";
import { formatFailure } from "~/deploy/errors";
import type { StepStatus } from "~/deploy/shared";
import { LogLevelConfigFromEnv } from "~/cli/log-level";
import { c } from "~/cli/colors";

const statusLabel = (status: StepStatus): string => {
  switch (status) {
    case "created":
      return c.green("created  ");
    case "updated":
      return c.yellow("updated  ");
    case "unchanged":
      return c.dim("unchanged");
  }
};

export const printReport = (report: DeployReport) =>
  Effect.gen(function* () {
    yield* Console.log(`\n${c.green(`Converged ${report.steps.length} step(s):`)}`);

    const width = Math.max(...report.steps.map(s => s.step.length));
    for (const { step, key, status } of report.steps) {
      yield* Console.log(`  ${statusLabel(status)}  ${c.bold(step.padEnd(width))}  ${c.dim(key)}`);
    }

    yield* Console.log(`\n  API: ${c.cyan(report.url)}`);
    for (const route of report.routes) {
      yield* Console.log(`  ${c.cyan(`[${route.method}]`)}  ${c.bold(route.functionName)}  ${c.dim(`${report.url.replace(/\/+$/, "")}${route.path}`)}`);
    }
  });

export const deployCommand = Command.make("deploy", {}, () =>
  Effect.gen(function* () {
    const settings = resolveSettings();
    yield* Effect.logDebug(`Region ${settings.region}, endpoint ${settings.endpoint ?? "AWS"}`);

    const report = yield* deployImageService({ config, settings, projectDir: process.cwd() }).pipe(
      Effect.tapError(failure => Console.error(c.red(formatFailure(failure)))),
      Effect.provide(makeClients(settings))
    );

    yield* printReport(report);
  }).pipe(Effect.provide(LogLevelConfigFromEnv))
).pipe(
  Command.withDescription("Create or reconcile every resource of the image service")
);
