export type CodegenErrorCode = "SchemaError" | "UnsupportedType" | "EmitError";

export class CodegenError extends Error {
  readonly code: CodegenErrorCode;

  constructor(code: CodegenErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "CodegenError";
  }
}

export function schemaError(message: string): CodegenError {
  return new CodegenError("SchemaError", message);
}

export function assertNever(value: never, what: string): never {
  throw new CodegenError("EmitError", `Unsupported ${what}: ${JSON.stringify(value)}.`);
}
