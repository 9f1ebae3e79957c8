import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { Effect } from "effect"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"

import { bundleFunction, packageFunction, zip } from "~/build/bundle"

describe("zip", () => {

  it("should create a valid zip archive", async () => {
    const zipBuffer = await Effect.runPromise(zip({ content: "export const handler = async () => 1;" }));

    // ZIP file starts with PK signature (0x504B)
    expect(zipBuffer[0]).toBe(0x50); // P
    expect(zipBuffer[1]).toBe(0x4B); // K
    expect(zipBuffer.includes(Buffer.from("index.mjs"))).toBe(true);
  });

  it("should produce identical archives for identical content", async () => {
    const first = await Effect.runPromise(zip({ content: "same", filename: "index.mjs" }));
    const second = await Effect.runPromise(zip({ content: "same", filename: "index.mjs" }));

    expect(first.equals(second)).toBe(true);
  });

});

describe("bundleFunction", () => {

  let projectDir: string;

  beforeAll(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "bundle-test-"));
    fs.writeFileSync(path.join(projectDir, "greeting.ts"), `export const greeting = (name: string) => "hello " + name;\n`);
    fs.writeFileSync(
      path.join(projectDir, "handler.ts"),
      [
        `import { S3 } from "@aws-sdk/client-s3";`,
        `import { greeting } from "./greeting";`,
        `export const handler = async () => ({ body: greeting("world"), client: typeof S3 });`,
        ``,
      ].join("\n")
    );
  });

  afterAll(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it("should inline local modules and keep the AWS SDK external", async () => {
    const code = await Effect.runPromise(bundleFunction({ projectDir, entry: "handler.ts" }));

    expect(code).toContain(`"hello " + name`);
    expect(code).toContain(`from "@aws-sdk/client-s3"`);
    expect(code).toContain("export {");
  });

  it("should fail with PackageError for a missing entry", async () => {
    const error = await Effect.runPromise(Effect.flip(bundleFunction({ projectDir, entry: "missing.ts" })));

    expect(error._tag).toBe("PackageError");
    expect(error.entry).toBe("missing.ts");
  });

  it("should package a configured function as a zip", async () => {
    const archive = await Effect.runPromise(packageFunction(projectDir)("worker", { entry: "handler.ts" }));

    expect(archive[0]).toBe(0x50);
    expect(archive[1]).toBe(0x4B);
  });

});
