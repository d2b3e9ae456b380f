import { resolveGeneratorOptions, type GeneratorOptions } from "./config.js";
import { createStructContext, emitStructDecls } from "./passes/struct-impl.js";
import type { RustProgram } from "./rust/ir.js";
import { writeRustProgram } from "./rust/write.js";
import type { StructDef } from "./schema/model.js";

export function generateProgram(
  structs: readonly StructDef[],
  options: Partial<GeneratorOptions> = {}
): RustProgram {
  const resolved = resolveGeneratorOptions(options);
  const names: ReadonlySet<string> = new Set(structs.map((s) => s.name));
  return {
    kind: "program",
    items: structs.flatMap((def) => emitStructDecls(createStructContext(def, names, resolved))),
  };
}

export function generateRust(
  structs: readonly StructDef[],
  options: Partial<GeneratorOptions> = {},
  header: readonly string[] = []
): string {
  return writeRustProgram(generateProgram(structs, options), { header });
}
