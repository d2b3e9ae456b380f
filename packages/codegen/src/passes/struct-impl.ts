import type { GeneratorOptions } from "../config.js";
import { mapFieldType, type MappedType } from "../lowering/type-mapper.js";
import type { RustItem } from "../rust/ir.js";
import type { FieldDef, StructDef } from "../schema/model.js";
import { emitDataTypeFn } from "./data-type.js";
import type { StructContext } from "./contracts.js";
import { emitFromStructArrayFn } from "./from-struct-array.js";
import { emitIntoStructArrayFn } from "./into-struct-array.js";

export function createStructContext(
  def: StructDef,
  structNames: ReadonlySet<string>,
  options: GeneratorOptions
): StructContext {
  const mapped = new Map<FieldDef, MappedType>(def.fields.map((f) => [f, mapFieldType(f.type, structNames)]));
  return { def, options, mapped };
}

/** `use <module>::<Name>;` followed by the conversion impl. */
export function emitStructDecls(ctx: StructContext): readonly RustItem[] {
  const name = ctx.def.name;
  return [
    { kind: "use", path: { segments: [...ctx.options.modulePath, name] } },
    {
      kind: "impl",
      traitPath: { segments: [ctx.options.traitName] },
      typePath: { segments: [name] },
      items: [emitDataTypeFn(ctx), emitIntoStructArrayFn(ctx), emitFromStructArrayFn(ctx)],
    },
  ];
}
