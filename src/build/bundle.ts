import { Effect } from "effect";
import * as esbuild from "esbuild";
import * as path from "path";
import archiver from "archiver";
import type { FunctionConfig } from "~/config";
import { PackageError } from "~/deploy/errors";
import type { PackageCode } from "~/deploy/functions";

export type BundleInput = {
  projectDir: string;
  /** Function source, relative to `projectDir` or absolute */
  entry: string;
};

// AWS SDK v3 is available in the Lambda Node.js runtime, never bundle it
const AWS_EXTERNALS = ["@aws-sdk/*", "@smithy/*"];

export const bundleFunction = ({ projectDir, entry }: BundleInput): Effect.Effect<string, PackageError> =>
  Effect.gen(function* () {
    const entryPoint = path.isAbsolute(entry) ? entry : path.resolve(projectDir, entry);

    const result = yield* Effect.tryPromise({
      try: () => esbuild.build({
        entryPoints: [entryPoint],
        absWorkingDir: projectDir,
        bundle: true,
        platform: "node",
        target: "node20",
        write: false,
        minify: false,
        sourcemap: false,
        format: "esm",
        external: AWS_EXTERNALS,
        logLevel: "silent",
      }),
      catch: cause => new PackageError({ entry, cause }),
    });

    const output = result.outputFiles?.[0];
    if (!output) {
      return yield* Effect.fail(new PackageError({ entry, cause: new Error("esbuild produced no output") }));
    }
    return output.text;
  });

export type ZipInput = {
  content: string;
  filename?: string;
};

// Fixed date for deterministic zip (same content = same hash)
const FIXED_DATE = new Date(0);

export const zip = (input: ZipInput): Effect.Effect<Buffer, Error> =>
  Effect.async<Buffer, Error>(resume => {
    const chunks: Buffer[] = [];
    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("data", (chunk: Buffer) => chunks.push(chunk));
    archive.on("end", () => resume(Effect.succeed(Buffer.concat(chunks))));
    archive.on("error", err => resume(Effect.fail(err)));

    archive.append(input.content, { name: input.filename ?? "index.mjs", date: FIXED_DATE });
    archive.finalize().catch((err: unknown) =>
      resume(Effect.fail(err instanceof Error ? err : new Error(String(err))))
    );
  });

/**
 * Default packaging: bundle the function's entry and store it as `index.mjs`,
 * which the `index.handler` handler string points at.
 */
export const packageFunction = (projectDir: string): PackageCode =>
  (_name: string, fn: FunctionConfig) =>
    bundleFunction({ projectDir, entry: fn.entry }).pipe(
      Effect.flatMap(content =>
        zip({ content }).pipe(Effect.mapError(cause => new PackageError({ entry: fn.entry, cause })))
      ),
      Effect.tap(archive => Effect.logDebug(`Packaged ${fn.entry} (${archive.byteLength} bytes)`))
    );
