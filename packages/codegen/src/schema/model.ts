import { schemaError } from "../errors.js";

export type Version = {
  readonly major: number;
  readonly minor: number;
};

export type FieldDef = {
  readonly name?: string;
  // `null` is the no-data sentinel.
  readonly type: string | null;
  readonly index: number;
  readonly minVersion?: Version;
};

export type StructDef = {
  readonly name: string;
  readonly fields: readonly FieldDef[];
};

export function parseVersion(text: string): Version {
  const m = /^(\d+)\.(\d+)$/.exec(text);
  if (!m || m[1] === undefined || m[2] === undefined) {
    throw schemaError(`Invalid version '${text}': expected '<major>.<minor>'.`);
  }
  return { major: Number(m[1]), minor: Number(m[2]) };
}

export function formatVersion(v: Version): string {
  return `${v.major}.${v.minor}`;
}

export function compareVersions(a: Version, b: Version): number {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  return 0;
}

export function sameVersion(a: Version | undefined, b: Version | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return compareVersions(a, b) === 0;
}

/**
 * Every field carries a name. Named structs thread a validity bitmap
 * through their columnar form; unnamed (tuple) structs never do.
 */
export function isNamed(def: StructDef): boolean {
  return def.fields.every((f) => f.name !== undefined);
}

export function fieldKey(field: FieldDef): string {
  return field.name ?? String(field.index);
}

/**
 * Fields introduced by later format revisions always follow older ones.
 * An unversioned field after a versioned one counts as a decrease.
 */
export function assertMonotonicVersions(structName: string, fields: readonly FieldDef[]): void {
  let prev: Version | undefined;
  for (const f of fields) {
    const cur = f.minVersion;
    if (prev && (!cur || compareVersions(cur, prev) < 0)) {
      const shown = cur ? formatVersion(cur) : "none";
      throw schemaError(
        `${structName}.${f.name ?? f.index}: minVersion ${shown} follows ${formatVersion(prev)}; versions must be non-decreasing.`
      );
    }
    prev = cur;
  }
}
