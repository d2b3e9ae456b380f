import { dataTypeExpr, nullDataTypeExpr } from "../lowering/type-mapper.js";
import { groupByVersion, VERSION_PARAM } from "../lowering/version-groups.js";
import type { RustExpr, RustFnItem, RustStmt } from "../rust/ir.js";
import { assocCall, callExpr, exprStmt, identExpr, letStmt, methodCall, pathExpr, pathType } from "../rust/ir.js";
import { fieldKey } from "../schema/model.js";
import { mappedTypeOf, type StructContext } from "./contracts.js";

export const DUMMY_FIELD_NAME = "_dummy";

function arrowField(name: string, dataType: RustExpr, nullable: boolean): RustExpr {
  return assocCall(["Field"], "new", [{ kind: "string", value: name }, dataType, { kind: "bool", value: nullable }]);
}

function pushField(field: RustExpr): RustStmt {
  return exprStmt(methodCall(identExpr("fields"), "push", [field]));
}

/** `fn data_type(version: Version) -> DataType` */
export function emitDataTypeFn(ctx: StructContext): RustFnItem {
  const pushes = groupByVersion(ctx.def.name, ctx.def.fields, (f) =>
    pushField(arrowField(fieldKey(f), dataTypeExpr(mappedTypeOf(ctx, f), VERSION_PARAM), false))
  );

  // arrow2 rejects a StructArray without fields.
  const dummy: RustStmt = {
    kind: "if",
    cond: methodCall(identExpr("fields"), "is_empty"),
    then: [pushField(arrowField(DUMMY_FIELD_NAME, nullDataTypeExpr(), true))],
  };

  return {
    kind: "fn",
    receiver: { kind: "none" },
    name: "data_type",
    params: [{ name: VERSION_PARAM, type: pathType([ctx.options.versionType]) }],
    ret: pathType(["DataType"]),
    body: [letStmt("fields", { kind: "vec", elems: [] }, true), ...pushes, dummy],
    tail: callExpr(pathExpr(["DataType", "Struct"]), [identExpr("fields")]),
  };
}
