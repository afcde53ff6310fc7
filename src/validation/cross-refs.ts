import type { CrossReferenceIssue, IdDefinition, IdReference, Issue } from "../types.js";
import { baseId, parseId, systemOf, type IdFormatOptions } from "./id-format.js";
import { makeIssue } from "./rules.js";

/** Global ID index for one validation run. First definition wins; every duplicate is kept. */
export interface IdIndex {
  definitions: Map<string, IdDefinition>;
  /** IDs defined more than once, with every occurrence in scan order. */
  duplicates: Map<string, IdDefinition[]>;
  /** Definitions grouped by version-less base ID. */
  byBase: Map<string, IdDefinition[]>;
}

export interface CrossReferenceRules extends IdFormatOptions {
  /** Artifact kinds present in the scanned set. */
  scopeKinds: ReadonlySet<string>;
  /** When non-empty, definitions of other kinds get a warning. */
  knownKinds: readonly string[];
}

export function buildIdIndex(definitions: IdDefinition[]): IdIndex {
  const index: IdIndex = {
    definitions: new Map(),
    duplicates: new Map(),
    byBase: new Map(),
  };
  const occurrences = new Map<string, IdDefinition[]>();

  for (const def of definitions) {
    const seen = occurrences.get(def.id);
    if (seen) {
      seen.push(def);
    } else {
      occurrences.set(def.id, [def]);
      index.definitions.set(def.id, def);
    }

    const base = baseId(def.id);
    const group = index.byBase.get(base);
    if (group) {
      group.push(def);
    } else {
      index.byBase.set(base, [def]);
    }
  }

  for (const [id, defs] of occurrences) {
    if (defs.length > 1) index.duplicates.set(id, defs);
  }
  return index;
}

function attribute(issue: Issue, artifactPath: string): CrossReferenceIssue {
  return { ...issue, artifactPath };
}

function isExternal(id: string, rules: CrossReferenceRules): boolean {
  if (rules.systems.length === 0) return false;
  if (!id.startsWith(`${rules.prefix}-`)) return false;
  return systemOf(id, rules) === null;
}

/**
 * Resolve every reference against the index and check coverage, checkbox
 * consistency and duplicate definitions across all artifacts in scope.
 */
export function validateCrossReferences(
  index: IdIndex,
  references: IdReference[],
  rules: CrossReferenceRules,
): CrossReferenceIssue[] {
  const issues: CrossReferenceIssue[] = [];

  for (const [id, defs] of index.duplicates) {
    const where = defs.map((d) => `${d.artifactPath}:${d.line}`).join(", ");
    for (const def of defs) {
      issues.push(
        attribute(
          makeIssue("DUPLICATE_DEFINITION", def.line, `ID ${id} is defined ${defs.length} times (${where})`),
          def.artifactPath,
        ),
      );
    }
  }

  for (const ref of references) {
    const def = index.definitions.get(ref.id);
    if (!def) {
      if (isExternal(ref.id, rules)) continue;
      const versions = index.byBase.get(baseId(ref.id));
      if (versions) {
        const current = [...new Set(versions.map((d) => d.id))].join(", ");
        issues.push(
          attribute(
            makeIssue("STALE_ID_REFERENCE", ref.line, `Reference ${ref.id} is stale; the ID is now defined as ${current}`),
            ref.artifactPath,
          ),
        );
      } else {
        issues.push(
          attribute(
            makeIssue("UNRESOLVED_REFERENCE", ref.line, `Reference ${ref.id} has no definition`),
            ref.artifactPath,
          ),
        );
      }
      continue;
    }

    if (ref.checked && !def.checked) {
      issues.push(
        attribute(
          makeIssue(
            "CHECKBOX_MISMATCH",
            ref.line,
            `Reference ${ref.id} is checked but its definition (${def.artifactPath}:${def.line}) is not`,
          ),
          ref.artifactPath,
        ),
      );
    } else if (ref.hasCheckbox && !ref.checked && def.checked) {
      issues.push(
        attribute(
          makeIssue(
            "CHECKBOX_MISMATCH",
            ref.line,
            `Reference ${ref.id} is unchecked but its definition (${def.artifactPath}:${def.line}) is checked`,
          ),
          ref.artifactPath,
        ),
      );
    }
  }

  for (const def of index.definitions.values()) {
    if (def.coveredBy.length === 0) continue;
    const covered = references.some(
      (ref) => ref.id === def.id && def.coveredBy.includes(ref.artifactKind),
    );
    if (covered) continue;
    const kinds = def.coveredBy.join(" or ");
    if (def.coveredBy.some((kind) => rules.scopeKinds.has(kind))) {
      issues.push(
        attribute(
          makeIssue("MISSING_COVERAGE", def.line, `ID ${def.id} must be referenced from ${kinds}`),
          def.artifactPath,
        ),
      );
    } else {
      issues.push(
        attribute(
          makeIssue(
            "COVERAGE_NOT_IN_SCOPE",
            def.line,
            `ID ${def.id} must be referenced from ${kinds}, but no such artifact is registered`,
          ),
          def.artifactPath,
        ),
      );
    }
  }

  if (rules.knownKinds.length > 0) {
    for (const def of index.definitions.values()) {
      const kind = parseId(def.id, rules)?.kind;
      if (kind !== undefined && !rules.knownKinds.includes(kind)) {
        issues.push(
          attribute(
            makeIssue("UNKNOWN_ID_KIND", def.line, `ID ${def.id} uses unknown kind "${kind}"`),
            def.artifactPath,
          ),
        );
      }
    }
  }

  return issues;
}
