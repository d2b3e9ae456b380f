export type GeneratorOptions = {
  // Module the generated `use` statements import each struct from.
  readonly modulePath: readonly string[];
  readonly traitName: string;
  readonly versionType: string;
};

export const DEFAULT_GENERATOR_OPTIONS: GeneratorOptions = Object.freeze({
  modulePath: Object.freeze(["crate", "frame", "immutable"]),
  traitName: "StructArrayConvertible",
  versionType: "Version",
});

export function resolveGeneratorOptions(partial?: Partial<GeneratorOptions>): GeneratorOptions {
  return Object.freeze({ ...DEFAULT_GENERATOR_OPTIONS, ...partial });
}
