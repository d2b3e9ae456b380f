import { arrayTypeOf } from "../lowering/type-mapper.js";
import { VERSION_PARAM, versionAtLeast } from "../lowering/version-groups.js";
import type { RustExpr, RustFnItem, RustStructLitField, RustType } from "../rust/ir.js";
import { assocCall, callExpr, identExpr, methodCall, numberExpr, pathType } from "../rust/ir.js";
import { isNamed, type FieldDef } from "../schema/model.js";
import { mappedTypeOf, type StructContext } from "./contracts.js";

/** `<target>.as_any().downcast_ref::<T>().unwrap().clone()` */
function downcastClone(target: RustExpr, as: RustType): RustExpr {
  const downcast = methodCall(methodCall(target, "as_any"), "downcast_ref", [], [as]);
  return methodCall(methodCall(downcast, "unwrap"), "clone");
}

/**
 * Reads `values[field.index]` back into the field's value.
 *
 * Versioned fields get their own explicit check instead of sharing a
 * guard: a struct whose fields are all versioned is serialized with a
 * placeholder column at index 0, so every field must address its declared
 * index and decide presence independently.
 */
export function fieldValue(ctx: StructContext, field: FieldDef): RustExpr {
  const column: RustExpr = { kind: "index", expr: identExpr("values"), index: numberExpr(field.index) };
  const mapped = mappedTypeOf(ctx, field);
  const body =
    mapped.kind === "struct"
      ? assocCall([mapped.name], "from_struct_array", [
          downcastClone(column, arrayTypeOf(mapped)),
          identExpr(VERSION_PARAM),
        ])
      : downcastClone(column, arrayTypeOf(mapped));

  if (!field.minVersion) return body;
  return {
    kind: "if",
    cond: versionAtLeast(field.minVersion),
    then: callExpr(identExpr("Some"), [body]),
    else: identExpr("None"),
  };
}

/** `fn from_struct_array(array: StructArray, version: Version) -> Self` */
export function emitFromStructArrayFn(ctx: StructContext): RustFnItem {
  const named = isNamed(ctx.def);
  const fields: readonly RustStructLitField[] = [
    ...ctx.def.fields.map((f) => ({
      ...(f.name !== undefined ? { name: f.name } : {}),
      expr: fieldValue(ctx, f),
    })),
    ...(named ? [{ name: "validity", expr: identExpr("validity") }] : []),
  ];

  return {
    kind: "fn",
    receiver: { kind: "none" },
    name: "from_struct_array",
    params: [
      { name: "array", type: pathType(["StructArray"]) },
      { name: VERSION_PARAM, type: pathType([ctx.options.versionType]) },
    ],
    ret: pathType(["Self"]),
    body: [
      {
        kind: "let",
        pattern: {
          kind: "tuple",
          elems: [
            { kind: "wild" },
            { kind: "ident", name: "values" },
            named ? { kind: "ident", name: "validity" } : { kind: "wild" },
          ],
        },
        mut: false,
        init: methodCall(identExpr("array"), "into_data"),
      },
    ],
    tail: { kind: "struct_lit", typePath: { segments: ["Self"] }, fields },
  };
}
