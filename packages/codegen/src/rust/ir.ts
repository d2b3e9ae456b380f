export type RustPath = {
  readonly segments: readonly string[];
};

export type RustType = { readonly kind: "path"; readonly path: RustPath; readonly args: readonly RustType[] };

export type RustPattern =
  | { readonly kind: "wild" }
  | { readonly kind: "ident"; readonly name: string }
  | { readonly kind: "tuple"; readonly elems: readonly RustPattern[] };

export type RustStructLitField = {
  // Absent for tuple-struct positions.
  readonly name?: string;
  readonly expr: RustExpr;
};

export type RustExpr =
  | { readonly kind: "ident"; readonly name: string }
  | { readonly kind: "path"; readonly path: RustPath }
  | { readonly kind: "number"; readonly text: string }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "field"; readonly expr: RustExpr; readonly name: string }
  | { readonly kind: "index"; readonly expr: RustExpr; readonly index: RustExpr }
  | { readonly kind: "call"; readonly callee: RustExpr; readonly args: readonly RustExpr[] }
  | {
      readonly kind: "assoc_call";
      readonly typePath: RustPath;
      readonly typeArgs: readonly RustType[];
      readonly member: string;
      readonly args: readonly RustExpr[];
    }
  | {
      readonly kind: "method_call";
      readonly receiver: RustExpr;
      readonly method: string;
      readonly typeArgs: readonly RustType[];
      readonly args: readonly RustExpr[];
    }
  | { readonly kind: "struct_lit"; readonly typePath: RustPath; readonly fields: readonly RustStructLitField[] }
  | { readonly kind: "vec"; readonly elems: readonly RustExpr[] }
  | { readonly kind: "closure"; readonly params: readonly string[]; readonly body: RustExpr }
  | { readonly kind: "if"; readonly cond: RustExpr; readonly then: RustExpr; readonly else: RustExpr };

export type RustStmt =
  | {
      readonly kind: "let";
      readonly pattern: RustPattern;
      readonly mut: boolean;
      readonly init: RustExpr;
    }
  | { readonly kind: "expr"; readonly expr: RustExpr }
  | {
      readonly kind: "if";
      readonly cond: RustExpr;
      readonly then: readonly RustStmt[];
    };

export type RustParam = { readonly name: string; readonly type: RustType };

export type RustReceiver = { readonly kind: "none" } | { readonly kind: "self" };

export type RustFnItem = {
  readonly kind: "fn";
  readonly receiver: RustReceiver;
  readonly name: string;
  readonly params: readonly RustParam[];
  readonly ret: RustType;
  readonly body: readonly RustStmt[];
  readonly tail: RustExpr;
};

export type RustItem =
  | { readonly kind: "use"; readonly path: RustPath }
  | {
      readonly kind: "impl";
      readonly traitPath: RustPath;
      readonly typePath: RustPath;
      readonly items: readonly RustFnItem[];
    };

export type RustProgram = {
  readonly kind: "program";
  readonly items: readonly RustItem[];
};

export function pathType(segments: readonly string[], args: readonly RustType[] = []): RustType {
  return { kind: "path", path: { segments }, args };
}

export function identExpr(name: string): RustExpr {
  return { kind: "ident", name };
}

export function pathExpr(segments: readonly string[]): RustExpr {
  return { kind: "path", path: { segments } };
}

export function numberExpr(value: number): RustExpr {
  return { kind: "number", text: String(value) };
}

export function fieldExpr(expr: RustExpr, name: string): RustExpr {
  return { kind: "field", expr, name };
}

export function callExpr(callee: RustExpr, args: readonly RustExpr[]): RustExpr {
  return { kind: "call", callee, args };
}

export function assocCall(
  typePath: readonly string[],
  member: string,
  args: readonly RustExpr[],
  typeArgs: readonly RustType[] = []
): RustExpr {
  return { kind: "assoc_call", typePath: { segments: typePath }, typeArgs, member, args };
}

export function methodCall(
  receiver: RustExpr,
  method: string,
  args: readonly RustExpr[] = [],
  typeArgs: readonly RustType[] = []
): RustExpr {
  return { kind: "method_call", receiver, method, typeArgs, args };
}

export function exprStmt(expr: RustExpr): RustStmt {
  return { kind: "expr", expr };
}

export function letStmt(name: string, init: RustExpr, mut = false): RustStmt {
  return { kind: "let", pattern: { kind: "ident", name }, mut, init };
}
