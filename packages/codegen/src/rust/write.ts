import { assertNever } from "../errors.js";
import type {
  RustExpr,
  RustFnItem,
  RustItem,
  RustParam,
  RustPattern,
  RustProgram,
  RustStmt,
  RustStructLitField,
  RustType,
} from "./ir.js";

const INDENT = "  ";

function emitPath(segments: readonly string[]): string {
  return segments.join("::");
}

function emitType(ty: RustType): string {
  const base = emitPath(ty.path.segments);
  if (ty.args.length === 0) return base;
  return `${base}<${ty.args.map(emitType).join(", ")}>`;
}

function emitTurbofish(args: readonly RustType[]): string {
  return args.length > 0 ? `::<${args.map(emitType).join(", ")}>` : "";
}

function emitArgs(args: readonly RustExpr[]): string {
  return args.map(emitExpr).join(", ");
}

function emitPattern(p: RustPattern): string {
  switch (p.kind) {
    case "wild":
      return "_";
    case "ident":
      return p.name;
    case "tuple":
      return `(${p.elems.map(emitPattern).join(", ")})`;
    default:
      return assertNever(p, "pattern");
  }
}

function emitStructLit(base: string, fields: readonly RustStructLitField[]): string {
  if (fields.length > 0 && fields.every((f) => f.name === undefined)) {
    return `${base}(${fields.map((f) => emitExpr(f.expr)).join(", ")})`;
  }
  if (fields.length === 0) return `${base} {}`;
  const inner = fields
    .map((f, i) => {
      const name = f.name ?? String(i);
      // Field init shorthand.
      if (f.expr.kind === "ident" && f.expr.name === name) return name;
      return `${name}: ${emitExpr(f.expr)}`;
    })
    .join(", ");
  return `${base} { ${inner} }`;
}

export function emitExpr(expr: RustExpr): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "path":
      return emitPath(expr.path.segments);
    case "number":
      return expr.text;
    case "string":
      return JSON.stringify(expr.value);
    case "bool":
      return expr.value ? "true" : "false";
    case "field":
      return `${emitExpr(expr.expr)}.${expr.name}`;
    case "index":
      return `${emitExpr(expr.expr)}[${emitExpr(expr.index)}]`;
    case "call":
      return `${emitExpr(expr.callee)}(${emitArgs(expr.args)})`;
    case "assoc_call": {
      const base = emitPath(expr.typePath.segments);
      return `${base}${emitTurbofish(expr.typeArgs)}::${expr.member}(${emitArgs(expr.args)})`;
    }
    case "method_call":
      return `${emitExpr(expr.receiver)}.${expr.method}${emitTurbofish(expr.typeArgs)}(${emitArgs(expr.args)})`;
    case "struct_lit":
      return emitStructLit(emitPath(expr.typePath.segments), expr.fields);
    case "vec":
      return `vec![${emitArgs(expr.elems)}]`;
    case "closure":
      return `|${expr.params.join(", ")}| ${emitExpr(expr.body)}`;
    case "if":
      return `if ${emitExpr(expr.cond)} { ${emitExpr(expr.then)} } else { ${emitExpr(expr.else)} }`;
    default:
      return assertNever(expr, "expression");
  }
}

function emitStmtLines(st: RustStmt, indent: string): string[] {
  switch (st.kind) {
    case "let": {
      const mut = st.mut ? "mut " : "";
      return [`${indent}let ${mut}${emitPattern(st.pattern)} = ${emitExpr(st.init)};`];
    }
    case "expr":
      return [`${indent}${emitExpr(st.expr)};`];
    case "if": {
      const out: string[] = [];
      out.push(`${indent}if ${emitExpr(st.cond)} {`);
      for (const s of st.then) out.push(...emitStmtLines(s, `${indent}${INDENT}`));
      out.push(`${indent}}`);
      return out;
    }
    default:
      return assertNever(st, "statement");
  }
}

function emitParam(p: RustParam): string {
  return `${p.name}: ${emitType(p.type)}`;
}

function emitFn(item: RustFnItem, indent: string): string[] {
  const out: string[] = [];
  const params = [...(item.receiver.kind === "self" ? ["self"] : []), ...item.params.map(emitParam)];
  out.push(`${indent}fn ${item.name}(${params.join(", ")}) -> ${emitType(item.ret)} {`);
  const bodyIndent = `${indent}${INDENT}`;
  for (const st of item.body) out.push(...emitStmtLines(st, bodyIndent));
  out.push(`${bodyIndent}${emitExpr(item.tail)}`);
  out.push(`${indent}}`);
  return out;
}

function emitItem(item: RustItem, indent: string): string[] {
  switch (item.kind) {
    case "use":
      return [`${indent}use ${emitPath(item.path.segments)};`];
    case "impl": {
      const out: string[] = [];
      out.push(`${indent}impl ${emitPath(item.traitPath.segments)} for ${emitPath(item.typePath.segments)} {`);
      const innerIndent = `${indent}${INDENT}`;
      let first = true;
      for (const inner of item.items) {
        if (!first) out.push("");
        out.push(...emitFn(inner, innerIndent));
        first = false;
      }
      out.push(`${indent}}`);
      return out;
    }
    default:
      return assertNever(item, "item");
  }
}

export function writeRustProgram(program: RustProgram, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  for (const item of program.items) {
    if (parts.length > 0) parts.push("");
    parts.push(...emitItem(item, ""));
  }
  parts.push("");
  return parts.join("\n");
}
