import { flattenTemplate } from "../template/parser.js";
import type { IdDefinition, IdReference } from "../types.js";
import { baseId } from "../validation/id-format.js";
import { loadRegistered, loadScope, type LoadedArtifact, type ValidationContext } from "../validation/pipeline.js";

export interface ListIdsFilters {
  /** Only IDs defined in this artifact. */
  artifact?: string;
  /** Substring of the ID, or a regular expression with `regex`. */
  pattern?: string;
  regex?: boolean;
  /** ID block name (`actor`, `fr`, ...). */
  kind?: string;
  /** Keep every occurrence instead of the first definition per ID. */
  all?: boolean;
}

export interface KindSummary {
  kind: string;
  /** Artifact kinds whose templates declare an `id:{kind}` block. */
  artifactKinds: string[];
  definitions: number;
}

/** The whole registry, or just the named artifact, which must be registered and parse. */
async function scan(ctx: ValidationContext, artifact?: string): Promise<LoadedArtifact[]> {
  if (artifact === undefined) return loadScope(ctx, { skipBroken: true });
  return [await loadRegistered(ctx, artifact)];
}

function idMatcher(filters: ListIdsFilters): (id: string) => boolean {
  const { pattern } = filters;
  if (pattern === undefined) return () => true;
  if (!filters.regex) return (id) => id.includes(pattern);
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid --pattern regular expression: ${message}`);
  }
  return (id) => re.test(id);
}

/** Definitions across the registered artifacts, in registry then document order. */
export async function listIds(ctx: ValidationContext, filters: ListIdsFilters = {}): Promise<IdDefinition[]> {
  const matches = idMatcher(filters);
  const defs = (await scan(ctx, filters.artifact))
    .flatMap((l) => l.definitions)
    .filter((d) => matches(d.id) && (filters.kind === undefined || d.idKind === filters.kind));
  if (filters.all) return defs;

  const seen = new Set<string>();
  return defs.filter((d) => {
    if (seen.has(d.id)) return false;
    seen.add(d.id);
    return true;
  });
}

/** First definition of exactly this ID, or null. */
export async function whereDefined(ctx: ValidationContext, id: string): Promise<IdDefinition | null> {
  for (const loaded of await scan(ctx)) {
    const def = loaded.definitions.find((d) => d.id === id);
    if (def) return def;
  }
  return null;
}

export interface WhereUsedResult {
  references: IdReference[];
  definitions: IdDefinition[];
}

/** Every reference to the ID, any version: `foo-v1` and `foo-v2` are the same entity here. */
export async function whereUsed(ctx: ValidationContext, id: string): Promise<WhereUsedResult> {
  const base = baseId(id);
  const scope = await scan(ctx);
  return {
    references: scope.flatMap((l) => l.references).filter((r) => baseId(r.id) === base),
    definitions: scope.flatMap((l) => l.definitions).filter((d) => baseId(d.id) === base),
  };
}

/** ID kinds declared by the templates in use, with how many definitions each has. */
export async function listKinds(ctx: ValidationContext, artifact?: string): Promise<KindSummary[]> {
  const scope = await scan(ctx, artifact);
  const kinds = new Map<string, KindSummary>();
  const summaryFor = (kind: string): KindSummary => {
    let summary = kinds.get(kind);
    if (!summary) {
      summary = { kind, artifactKinds: [], definitions: 0 };
      kinds.set(kind, summary);
    }
    return summary;
  };

  for (const loaded of scope) {
    for (const tpl of flattenTemplate(loaded.template)) {
      if (tpl.blockType !== "id") continue;
      const summary = summaryFor(tpl.name);
      if (!summary.artifactKinds.includes(loaded.entry.kind)) summary.artifactKinds.push(loaded.entry.kind);
    }
    for (const def of loaded.definitions) summaryFor(def.idKind).definitions++;
  }

  return [...kinds.values()]
    .map((s) => ({ ...s, artifactKinds: [...s.artifactKinds].sort() }))
    .sort((a, b) => (a.kind < b.kind ? -1 : a.kind > b.kind ? 1 : 0));
}
