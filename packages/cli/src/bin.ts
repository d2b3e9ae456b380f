import { argv, exit, stdout } from "node:process";
import { pathToFileURL } from "node:url";

import { CodegenError } from "@colgen/codegen";

import { defaultSchemaPath, runGenerate } from "./internal/generate.js";

export function formatFailure(err: unknown): string {
  if (err instanceof CodegenError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

function main(): void {
  if (argv.length > 2) {
    console.error("Usage: colgen > generated.rs");
    exit(1);
  }
  try {
    runGenerate({ schemaPath: defaultSchemaPath(), write: (text) => stdout.write(text) });
  } catch (err: unknown) {
    console.error(formatFailure(err));
    exit(1);
  }
}

if (argv[1] && import.meta.url === pathToFileURL(argv[1]).href) {
  main();
}
