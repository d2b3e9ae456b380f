export type { GeneratorOptions } from "./config.js";
export { DEFAULT_GENERATOR_OPTIONS, resolveGeneratorOptions } from "./config.js";
export type { CodegenErrorCode } from "./errors.js";
export { CodegenError } from "./errors.js";
export { generateProgram, generateRust } from "./generate.js";
export type { FieldDef, StructDef, Version } from "./schema/model.js";
export { compareVersions, formatVersion, isNamed, parseVersion } from "./schema/model.js";
export { loadSchema, parseSchema } from "./schema/reader.js";
export type { RustProgram } from "./rust/ir.js";
export { writeRustProgram } from "./rust/write.js";
