import { expect } from "chai";

import { generateProgram, generateRust } from "./generate.js";
import { CodegenError } from "./errors.js";
import { parseSchema } from "./schema/reader.js";

const POSITION = { name: "Position", fields: [{ name: "x", type: "f32" }, { name: "y", type: "f32" }] };
const END = { name: "End", fields: [{ name: "latest_finalized_frame", type: "i32", minVersion: "3.0" }] };

describe("@colgen/codegen generate", () => {
  it("writes a use statement and a conversion impl for a plain struct", () => {
    expect(generateRust(parseSchema({ schema: 1, structs: [POSITION] }))).to.equal(
      [
        "use crate::frame::immutable::Position;",
        "",
        "impl StructArrayConvertible for Position {",
        "  fn data_type(version: Version) -> DataType {",
        "    let mut fields = vec![];",
        '    fields.push(Field::new("x", DataType::Float32, false));',
        '    fields.push(Field::new("y", DataType::Float32, false));',
        "    if fields.is_empty() {",
        '      fields.push(Field::new("_dummy", DataType::Null, true));',
        "    }",
        "    DataType::Struct(fields)",
        "  }",
        "",
        "  fn into_struct_array(self, version: Version) -> StructArray {",
        "    let mut values = vec![];",
        "    values.push(self.x.boxed());",
        "    values.push(self.y.boxed());",
        "    if values.is_empty() {",
        "      let len = self.validity.as_ref().map_or(0, |b| b.len());",
        "      values.push(arrow2::array::NullArray::new(DataType::Null, len).boxed());",
        "    }",
        "    StructArray::new(Self::data_type(version), values, self.validity)",
        "  }",
        "",
        "  fn from_struct_array(array: StructArray, version: Version) -> Self {",
        "    let (_, values, validity) = array.into_data();",
        "    Self { x: values[0].as_any().downcast_ref::<PrimitiveArray<f32>>().unwrap().clone(), y: values[1].as_any().downcast_ref::<PrimitiveArray<f32>>().unwrap().clone(), validity }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("keeps a placeholder column for a struct whose only field is versioned", () => {
    expect(generateRust(parseSchema({ schema: 1, structs: [END] }))).to.equal(
      [
        "use crate::frame::immutable::End;",
        "",
        "impl StructArrayConvertible for End {",
        "  fn data_type(version: Version) -> DataType {",
        "    let mut fields = vec![];",
        "    if version.gte(3, 0) {",
        '      fields.push(Field::new("latest_finalized_frame", DataType::Int32, false));',
        "    }",
        "    if fields.is_empty() {",
        '      fields.push(Field::new("_dummy", DataType::Null, true));',
        "    }",
        "    DataType::Struct(fields)",
        "  }",
        "",
        "  fn into_struct_array(self, version: Version) -> StructArray {",
        "    let mut values = vec![];",
        "    if version.gte(3, 0) {",
        "      values.push(self.latest_finalized_frame.unwrap().boxed());",
        "    }",
        "    if values.is_empty() {",
        "      let len = self.validity.as_ref().map_or(0, |b| b.len());",
        "      values.push(arrow2::array::NullArray::new(DataType::Null, len).boxed());",
        "    }",
        "    StructArray::new(Self::data_type(version), values, self.validity)",
        "  }",
        "",
        "  fn from_struct_array(array: StructArray, version: Version) -> Self {",
        "    let (_, values, validity) = array.into_data();",
        "    Self { latest_finalized_frame: if version.gte(3, 0) { Some(values[0].as_any().downcast_ref::<PrimitiveArray<i32>>().unwrap().clone()) } else { None }, validity }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("keeps declaration order across structs", () => {
    const program = generateProgram(parseSchema({ schema: 1, structs: [END, POSITION] }));
    expect(program.items.map((i) => (i.kind === "use" ? `use ${i.path.segments.join("::")}` : i.kind))).to.deep.equal([
      "use crate::frame::immutable::End",
      "impl",
      "use crate::frame::immutable::Position",
      "impl",
    ]);
  });

  it("applies generator options", () => {
    const text = generateRust(parseSchema({ schema: 1, structs: [POSITION] }), {
      modulePath: ["crate", "model"],
      traitName: "Columnar",
    });
    expect(text.split("\n").slice(0, 3)).to.deep.equal([
      "use crate::model::Position;",
      "",
      "impl Columnar for Position {",
    ]);
  });

  it("prepends the header lines before the first struct", () => {
    const text = generateRust(parseSchema({ schema: 1, structs: [POSITION] }), {}, ["// banner"]);
    expect(text.split("\n").slice(0, 3)).to.deep.equal(["// banner", "", "use crate::frame::immutable::Position;"]);
  });

  it("builds a fresh tree on every call", () => {
    const structs = parseSchema({ schema: 1, structs: [POSITION] });
    const a = generateProgram(structs);
    const b = generateProgram(structs);
    expect(a).to.deep.equal(b);
    expect(a.items[1]).to.not.equal(b.items[1]);
  });

  it("fails on a field type that is neither primitive nor declared", () => {
    const structs = parseSchema({ schema: 1, structs: [{ name: "Pre", fields: [{ name: "position", type: "Position" }] }] });
    expect(() => generateRust(structs))
      .to.throw(CodegenError, "Unknown field type 'Position'.")
      .with.property("code", "UnsupportedType");
  });
});
