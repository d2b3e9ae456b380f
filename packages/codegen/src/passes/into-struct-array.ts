import { groupByVersion, VERSION_PARAM } from "../lowering/version-groups.js";
import type { RustExpr, RustFnItem, RustStmt } from "../rust/ir.js";
import {
  assocCall,
  exprStmt,
  fieldExpr,
  identExpr,
  letStmt,
  methodCall,
  numberExpr,
  pathExpr,
  pathType,
} from "../rust/ir.js";
import { fieldKey, isNamed, type FieldDef } from "../schema/model.js";
import { mappedTypeOf, type StructContext } from "./contracts.js";

const SELF = identExpr("self");

function validityExpr(): RustExpr {
  return fieldExpr(SELF, "validity");
}

/** The boxed column for one field, read off `self`. */
export function columnValue(ctx: StructContext, field: FieldDef): RustExpr {
  const read = fieldExpr(SELF, fieldKey(field));
  // Only reached inside the field's version guard, so the Option is Some.
  const target = field.minVersion ? methodCall(read, "unwrap") : read;
  const mapped = mappedTypeOf(ctx, field);
  const column =
    mapped.kind === "struct" ? methodCall(target, "into_struct_array", [identExpr(VERSION_PARAM)]) : target;
  return methodCall(column, "boxed");
}

function pushValue(value: RustExpr): RustStmt {
  return exprStmt(methodCall(identExpr("values"), "push", [value]));
}

/** Row count for the placeholder column: the validity length, or 0. */
function dummyLength(named: boolean): RustExpr {
  if (!named) return numberExpr(0);
  return methodCall(methodCall(validityExpr(), "as_ref"), "map_or", [
    numberExpr(0),
    { kind: "closure", params: ["b"], body: methodCall(identExpr("b"), "len") },
  ]);
}

/** `fn into_struct_array(self, version: Version) -> StructArray` */
export function emitIntoStructArrayFn(ctx: StructContext): RustFnItem {
  const named = isNamed(ctx.def);
  const pushes = groupByVersion(ctx.def.name, ctx.def.fields, (f) => pushValue(columnValue(ctx, f)));

  // arrow2 rejects a StructArray without fields.
  const dummy: RustStmt = {
    kind: "if",
    cond: methodCall(identExpr("values"), "is_empty"),
    then: [
      letStmt("len", dummyLength(named)),
      pushValue(
        methodCall(
          assocCall(["arrow2", "array", "NullArray"], "new", [pathExpr(["DataType", "Null"]), identExpr("len")]),
          "boxed"
        )
      ),
    ],
  };

  return {
    kind: "fn",
    receiver: { kind: "self" },
    name: "into_struct_array",
    params: [{ name: VERSION_PARAM, type: pathType([ctx.options.versionType]) }],
    ret: pathType(["StructArray"]),
    body: [letStmt("values", { kind: "vec", elems: [] }, true), ...pushes, dummy],
    tail: assocCall(["StructArray"], "new", [
      assocCall(["Self"], "data_type", [identExpr(VERSION_PARAM)]),
      identExpr("values"),
      named ? validityExpr() : identExpr("None"),
    ]),
  };
}
