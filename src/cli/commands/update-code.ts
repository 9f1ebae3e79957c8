import { Args, Command } from "@effect/cli";
import { Console, Effect } from "effect";

import config from "~/image-service.config";
import { resolveSettings } from "~/config";
import { makeClients } from "~/aws";
import { updateFunctionCode } from "~/deploy/deploy";
import { formatFailure } from "~/deploy/errors";
import { LogLevelConfigFromEnv } from "~/cli/log-level";
import { c } from "~/cli/colors";

const functionArg = Args.text({ name: "function" }).pipe(
  Args.withDescription(`Function to update (${Object.keys(config.functions).join(", ")})`)
);

export const updateCodeCommand = Command.make("update-code", { fn: functionArg }, ({ fn }) =>
  Effect.gen(function* () {
    const settings = resolveSettings();

    const updated = yield* updateFunctionCode({ config, name: fn, projectDir: process.cwd() }).pipe(
      Effect.tapError(failure => Console.error(c.red(formatFailure(failure)))),
      Effect.provide(makeClients(settings))
    );

    yield* Console.log(`${c.green("Updated code of")} ${c.bold(updated.name)}  ${c.dim(updated.arn)}`);
  }).pipe(Effect.provide(LogLevelConfigFromEnv))
).pipe(
  Command.withDescription("Re-package one function and upload its code only")
);
