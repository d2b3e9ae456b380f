import { fileURLToPath } from "node:url";

import { generateRust, loadSchema } from "@colgen/codegen";

export function defaultSchemaPath(): string {
  return fileURLToPath(new URL("../../schema/structs.json", import.meta.url));
}

export const GENERATED_HEADER: readonly string[] = ["// Generated by colgen from structs.json. Do not edit."];

export type GenerateOptions = {
  readonly schemaPath: string;
  readonly write: (text: string) => void;
};

export function runGenerate(opts: GenerateOptions): void {
  const structs = loadSchema(opts.schemaPath);
  opts.write(generateRust(structs, {}, GENERATED_HEADER));
}
