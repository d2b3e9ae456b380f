import { CodegenError } from "../errors.js";
import type { RustExpr, RustType } from "../rust/ir.js";
import { assocCall, identExpr, pathExpr, pathType } from "../rust/ir.js";

export type PrimitiveEntry = {
  readonly token: string;
  // arrow2 `DataType` variant.
  readonly dataType: string;
  readonly arrayType: RustType;
};

function primitive(token: string, dataType: string): PrimitiveEntry {
  return { token, dataType, arrayType: pathType(["PrimitiveArray"], [pathType([token])]) };
}

export const PRIMITIVE_TYPES: ReadonlyMap<string, PrimitiveEntry> = new Map(
  [
    { token: "bool", dataType: "Boolean", arrayType: pathType(["BooleanArray"]) },
    primitive("i8", "Int8"),
    primitive("u8", "UInt8"),
    primitive("i16", "Int16"),
    primitive("u16", "UInt16"),
    primitive("i32", "Int32"),
    primitive("u32", "UInt32"),
    primitive("i64", "Int64"),
    primitive("u64", "UInt64"),
    primitive("f32", "Float32"),
    primitive("f64", "Float64"),
  ].map((e) => [e.token, e] as const)
);

export type MappedType =
  | { readonly kind: "primitive"; readonly entry: PrimitiveEntry }
  | { readonly kind: "null" }
  | { readonly kind: "struct"; readonly name: string };

/**
 * Resolves a field's type token against the primitive catalogue and the
 * set of declared struct names.
 */
export function mapFieldType(token: string | null, structNames: ReadonlySet<string>): MappedType {
  if (token === null) return { kind: "null" };
  const entry = PRIMITIVE_TYPES.get(token);
  if (entry) return { kind: "primitive", entry };
  if (structNames.has(token)) return { kind: "struct", name: token };
  throw new CodegenError("UnsupportedType", `Unknown field type '${token}'.`);
}

export function nullDataTypeExpr(): RustExpr {
  return pathExpr(["DataType", "Null"]);
}

/** The descriptor expression passed to `Field::new`. */
export function dataTypeExpr(mapped: MappedType, version: string): RustExpr {
  switch (mapped.kind) {
    case "primitive":
      return pathExpr(["DataType", mapped.entry.dataType]);
    case "null":
      return nullDataTypeExpr();
    case "struct":
      return assocCall([mapped.name], "data_type", [identExpr(version)]);
  }
}

/** Concrete array type a column is downcast to when reading it back. */
export function arrayTypeOf(mapped: MappedType): RustType {
  switch (mapped.kind) {
    case "primitive":
      return mapped.entry.arrayType;
    case "null":
      return pathType(["NullArray"]);
    case "struct":
      return pathType(["StructArray"]);
  }
}
