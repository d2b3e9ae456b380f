import type { GeneratorOptions } from "../config.js";
import type { MappedType } from "../lowering/type-mapper.js";
import type { FieldDef, StructDef } from "../schema/model.js";

/** Everything a per-struct generator needs; built fresh for each struct. */
export type StructContext = {
  readonly def: StructDef;
  readonly options: GeneratorOptions;
  readonly mapped: ReadonlyMap<FieldDef, MappedType>;
};

export function mappedTypeOf(ctx: StructContext, field: FieldDef): MappedType {
  const mapped = ctx.mapped.get(field);
  if (!mapped) {
    throw new Error(`${ctx.def.name}: field ${field.index} was not resolved.`);
  }
  return mapped;
}
