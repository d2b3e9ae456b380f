import { expect } from "chai";

import { DEFAULT_GENERATOR_OPTIONS } from "../config.js";
import type { RustFnItem, RustStmt } from "../rust/ir.js";
import { writeRustProgram } from "../rust/write.js";
import { parseSchema } from "../schema/reader.js";
import { emitDataTypeFn } from "./data-type.js";
import { createStructContext } from "./struct-impl.js";

// Renders a single function through an impl block, dedented back to column 0.
function renderFn(fn: RustFnItem): string {
  const text = writeRustProgram({
    kind: "program",
    items: [{ kind: "impl", traitPath: { segments: ["T"] }, typePath: { segments: ["S"] }, items: [fn] }],
  });
  return text.split("\n").slice(1, -2).map((line) => line.slice(2)).join("\n") + "\n";
}

function contextFor(structs: unknown, name: string) {
  const defs = parseSchema({ schema: 1, structs });
  const def = defs.find((d) => d.name === name);
  if (!def) throw new Error(`Expected struct ${name} in test fixture.`);
  return createStructContext(def, new Set(defs.map((d) => d.name)), DEFAULT_GENERATOR_OPTIONS);
}

function countPushes(stmts: readonly RustStmt[]): number {
  return stmts.reduce((n, st) => {
    if (st.kind === "if") return n + countPushes(st.then);
    if (st.kind === "expr" && st.expr.kind === "method_call" && st.expr.method === "push") return n + 1;
    return n;
  }, 0);
}

function render(structs: unknown, name: string): string {
  return renderFn(emitDataTypeFn(contextFor(structs, name)));
}

describe("@colgen/codegen data_type generator", () => {
  it("emits one descriptor per unversioned field, then the dummy fallback", () => {
    const structs = [{ name: "Triple", fields: [{ name: "a", type: "u8" }, { name: "b", type: "i64" }, { type: "f64" }] }];
    const fn = emitDataTypeFn(contextFor(structs, "Triple"));
    // Three field pushes plus the guarded `_dummy` push.
    expect(countPushes(fn.body)).to.equal(4);
    expect(render(structs, "Triple")).to.equal(
      [
        "fn data_type(version: Version) -> DataType {",
        "  let mut fields = vec![];",
        '  fields.push(Field::new("a", DataType::UInt8, false));',
        '  fields.push(Field::new("b", DataType::Int64, false));',
        '  fields.push(Field::new("2", DataType::Float64, false));',
        "  if fields.is_empty() {",
        '    fields.push(Field::new("_dummy", DataType::Null, true));',
        "  }",
        "  DataType::Struct(fields)",
        "}",
        "",
      ].join("\n")
    );
  });

  it("emits only the dummy descriptor for a struct without fields", () => {
    expect(render([{ name: "Empty", fields: [] }], "Empty")).to.equal(
      [
        "fn data_type(version: Version) -> DataType {",
        "  let mut fields = vec![];",
        "  if fields.is_empty() {",
        '    fields.push(Field::new("_dummy", DataType::Null, true));',
        "  }",
        "  DataType::Struct(fields)",
        "}",
        "",
      ].join("\n")
    );
  });

  it("composes nested structs and gates versioned fields", () => {
    const structs = [
      { name: "Position", fields: [{ name: "x", type: "f32" }] },
      {
        name: "Pre",
        fields: [
          { name: "position", type: "Position" },
          { name: "raw_analog_x", type: "i8", minVersion: "1.2" },
          { name: "percent", type: "f32", minVersion: "1.4" },
          { name: "nothing", type: null, minVersion: "1.4" },
        ],
      },
    ];
    expect(render(structs, "Pre")).to.equal(
      [
        "fn data_type(version: Version) -> DataType {",
        "  let mut fields = vec![];",
        '  fields.push(Field::new("position", Position::data_type(version), false));',
        "  if version.gte(1, 2) {",
        '    fields.push(Field::new("raw_analog_x", DataType::Int8, false));',
        "    if version.gte(1, 4) {",
        '      fields.push(Field::new("percent", DataType::Float32, false));',
        '      fields.push(Field::new("nothing", DataType::Null, false));',
        "    }",
        "  }",
        "  if fields.is_empty() {",
        '    fields.push(Field::new("_dummy", DataType::Null, true));',
        "  }",
        "  DataType::Struct(fields)",
        "}",
        "",
      ].join("\n")
    );
  });

  it("uses the configured version type", () => {
    const defs = parseSchema({ schema: 1, structs: [{ name: "P", fields: [] }] });
    const def = defs[0];
    if (!def) throw new Error("Expected struct P in test fixture.");
    const fn = emitDataTypeFn(
      createStructContext(def, new Set(["P"]), { ...DEFAULT_GENERATOR_OPTIONS, versionType: "FormatVersion" })
    );
    expect(fn.params).to.deep.equal([
      { name: "version", type: { kind: "path", path: { segments: ["FormatVersion"] }, args: [] } },
    ]);
  });
});
