#!/usr/bin/env node

import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect } from "effect";

import { deployCommand } from "./commands/deploy";
import { updateCodeCommand } from "./commands/update-code";

const mainCommand = Command.make("image-service").pipe(
  Command.withSubcommands([deployCommand, updateCodeCommand]),
  Command.withDescription("Idempotent deployer for the image service")
);

const cli = Command.run(mainCommand, {
  name: "image-service",
  version: "0.1.0",
});

// failures are printed by the commands themselves
cli(process.argv).pipe(
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain({ disableErrorReporting: true })
);
