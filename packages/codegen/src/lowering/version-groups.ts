import type { RustExpr, RustStmt } from "../rust/ir.js";
import { identExpr, methodCall, numberExpr } from "../rust/ir.js";
import { assertMonotonicVersions, sameVersion, type FieldDef, type Version } from "../schema/model.js";

export const VERSION_PARAM = "version";

export type VersionRun = {
  readonly minVersion?: Version;
  readonly fields: readonly FieldDef[];
};

/** `version.gte(major, minor)` */
export function versionAtLeast(v: Version): RustExpr {
  return methodCall(identExpr(VERSION_PARAM), "gte", [numberExpr(v.major), numberExpr(v.minor)]);
}

/** Splits fields into maximal runs of consecutive equal minVersion. */
export function versionRuns(fields: readonly FieldDef[]): readonly VersionRun[] {
  return fields.reduce<readonly VersionRun[]>((runs, field) => {
    const last = runs.at(-1);
    if (last && sameVersion(last.minVersion, field.minVersion)) {
      return [...runs.slice(0, -1), { ...last, fields: [...last.fields, field] }];
    }
    return [...runs, { ...(field.minVersion ? { minVersion: field.minVersion } : {}), fields: [field] }];
  }, []);
}

/**
 * Emits one statement per field in declaration order. Each run of fields
 * sharing a minVersion gets a single `if version.gte(..)` guard, and each
 * later (higher) run is nested inside the guard of the run before it.
 */
export function groupByVersion(
  structName: string,
  fields: readonly FieldDef[],
  emit: (field: FieldDef) => RustStmt
): readonly RustStmt[] {
  assertMonotonicVersions(structName, fields);
  // Emit left to right first; the right fold only builds the nesting.
  const emitted = versionRuns(fields).map((run) => ({ minVersion: run.minVersion, stmts: run.fields.map(emit) }));
  return emitted.reduceRight<readonly RustStmt[]>((inner, run) => {
    const stmts = [...run.stmts, ...inner];
    if (!run.minVersion) return stmts;
    return [{ kind: "if", cond: versionAtLeast(run.minVersion), then: stmts }];
  }, []);
}
