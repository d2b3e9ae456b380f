import { readFileSync } from "node:fs";

import { schemaError } from "../errors.js";
import { assertMonotonicVersions, parseVersion, type FieldDef, type StructDef } from "./model.js";

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw schemaError(`${label} must be a JSON object.`);
  }
  return value as Record<string, unknown>;
}

function asArray(value: unknown, label: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw schemaError(`${label} must be an array.`);
  }
  return value;
}

function assertKnownKeys(
  value: Record<string, unknown>,
  allowed: readonly string[],
  label: string
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw schemaError(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw schemaError(`${label} must be a non-empty string.`);
  }
  return value;
}

function asIdent(value: unknown, label: string): string {
  const text = asString(value, label);
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(text)) {
    throw schemaError(`${label} must be an identifier, got '${text}'.`);
  }
  return text;
}

function parseField(value: unknown, position: number, label: string): FieldDef {
  const raw = asRecord(value, label);
  assertKnownKeys(raw, ["name", "type", "index", "minVersion"], label);

  const name = raw.name === undefined ? undefined : asIdent(raw.name, `${label}.name`);
  const type = raw.type === null ? null : asIdent(raw.type, `${label}.type`);

  if (raw.index !== undefined && raw.index !== position) {
    throw schemaError(`${label}.index must equal the declaration position ${position}.`);
  }

  const minVersion =
    raw.minVersion === undefined ? undefined : parseVersion(asString(raw.minVersion, `${label}.minVersion`));

  return Object.freeze({
    ...(name !== undefined ? { name } : {}),
    type,
    index: position,
    ...(minVersion !== undefined ? { minVersion: Object.freeze(minVersion) } : {}),
  });
}

function parseStruct(value: unknown, position: number): StructDef {
  const label = `structs[${position}]`;
  const raw = asRecord(value, label);
  assertKnownKeys(raw, ["name", "fields"], label);

  const name = asIdent(raw.name, `${label}.name`);
  const fields = asArray(raw.fields, `${name}.fields`).map((f, i) => parseField(f, i, `${name}.fields[${i}]`));

  const seen = new Set<string>();
  for (const f of fields) {
    if (f.name === undefined) continue;
    if (seen.has(f.name)) throw schemaError(`${name}: duplicate field '${f.name}'.`);
    seen.add(f.name);
  }
  assertMonotonicVersions(name, fields);

  return Object.freeze({ name, fields: Object.freeze(fields) });
}

export function parseSchema(value: unknown): readonly StructDef[] {
  const root = asRecord(value, "schema");
  assertKnownKeys(root, ["schema", "structs"], "schema");
  if (root.schema !== 1) {
    throw schemaError("Unsupported schema version.");
  }

  const structs = asArray(root.structs, "schema: 'structs'").map(parseStruct);
  const names = new Set<string>();
  for (const s of structs) {
    if (names.has(s.name)) throw schemaError(`Duplicate struct '${s.name}'.`);
    names.add(s.name);
  }
  return Object.freeze(structs);
}

export function loadSchema(path: string): readonly StructDef[] {
  const raw = readFileSync(path, "utf-8");
  let value: unknown;
  try {
    value = JSON.parse(raw) as unknown;
  } catch (err) {
    throw schemaError(`${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSchema(value);
}
