import { loadConfig } from "../config/loader.js";
import { flattenBlocks, parseArtifact } from "../artifact/parser.js";
import type { Artifact } from "../artifact/types.js";
import { ConfigurationError, ParseError } from "../errors.js";
import { createRegistry, type RegisteredArtifact, type Registry } from "../registry/adapter.js";
import { score } from "../reporter/score.js";
import { flattenTemplate, parseTemplate } from "../template/parser.js";
import type { Template } from "../template/types.js";
import type {
  IdDefinition,
  IdReference,
  Issue,
  TracemarkConfig,
  ValidationReport,
  ValidationResult,
} from "../types.js";
import { buildIdIndex, validateCrossReferences } from "./cross-refs.js";
import { compilePlaceholders, validateStructure } from "./structure.js";

/** Everything one run needs. Built once per invocation and passed explicitly. */
export interface ValidationContext {
  projectDir: string;
  config: TracemarkConfig;
  registry: Registry;
}

/** A registered artifact parsed alongside its template, with IDs attributed to it. */
export interface LoadedArtifact {
  entry: RegisteredArtifact;
  template: Template;
  artifact: Artifact;
  definitions: IdDefinition[];
  references: IdReference[];
}

type TemplateCache = Map<string, Promise<Template>>;

export async function createContext(projectDir: string, configPath?: string): Promise<ValidationContext> {
  const config = await loadConfig(projectDir, configPath);
  return { projectDir, config, registry: createRegistry(config, projectDir) };
}

function loadTemplate(ctx: ValidationContext, cache: TemplateCache, entry: RegisteredArtifact): Promise<Template> {
  let pending = cache.get(entry.templatePath);
  if (!pending) {
    pending = parseTemplate(entry.templatePath, { prefix: ctx.config.prefix, kind: entry.kind });
    cache.set(entry.templatePath, pending);
  }
  return pending;
}

function collectIds(
  entry: RegisteredArtifact,
  template: Template,
  artifact: Artifact,
): { definitions: IdDefinition[]; references: IdReference[] } {
  const coverage = new Map<string, string[]>();
  for (const tpl of flattenTemplate(template)) {
    if (tpl.blockType === "id" && !coverage.has(tpl.name)) {
      coverage.set(tpl.name, [...tpl.coveredBy].sort());
    }
  }

  const definitions: IdDefinition[] = [];
  const references: IdReference[] = [];
  for (const block of flattenBlocks(artifact.blocks)) {
    for (const def of block.definitions) {
      definitions.push({
        id: def.id,
        artifactPath: entry.relativePath,
        artifactKind: entry.kind,
        line: def.line,
        checked: def.checked,
        hasCheckbox: def.hasCheckbox,
        ...(def.priority !== undefined ? { priority: def.priority } : {}),
        idKind: block.name,
        coveredBy: coverage.get(block.name) ?? [],
      });
    }
    for (const ref of block.references) {
      references.push({
        id: ref.id,
        artifactPath: entry.relativePath,
        artifactKind: entry.kind,
        line: ref.line,
        checked: ref.checked,
        hasCheckbox: ref.hasCheckbox,
        ...(ref.priority !== undefined ? { priority: ref.priority } : {}),
        source: ref.source,
      });
    }
  }
  return { definitions, references };
}

async function loadArtifact(
  ctx: ValidationContext,
  cache: TemplateCache,
  entry: RegisteredArtifact,
): Promise<LoadedArtifact> {
  const template = await loadTemplate(ctx, cache, entry);
  let artifact: Artifact;
  try {
    artifact = await parseArtifact(entry.artifactPath, { prefix: ctx.config.prefix });
  } catch (err) {
    if (err instanceof ParseError) err.path = entry.relativePath;
    throw err;
  }
  return { entry, template, artifact, ...collectIds(entry, template, artifact) };
}

/** Load one artifact named on the command line. Unregistered paths and parse errors throw. */
export async function loadRegistered(
  ctx: ValidationContext,
  artifactPath: string,
  cache: TemplateCache = new Map(),
): Promise<LoadedArtifact> {
  const entry = ctx.registry.resolve(artifactPath);
  if (!entry) {
    throw new ConfigurationError(`Artifact is not registered in .tracemark.json: ${artifactPath}`, artifactPath);
  }
  return loadArtifact(ctx, cache, entry);
}

/**
 * Parse every registered artifact. With `skipBroken`, files that fail to
 * parse are left out with a warning on stderr instead of aborting the run.
 */
export async function loadScope(
  ctx: ValidationContext,
  options: { skipBroken: boolean; cache?: TemplateCache; preloaded?: LoadedArtifact[] },
): Promise<LoadedArtifact[]> {
  const cache = options.cache ?? new Map<string, Promise<Template>>();
  const preloaded = new Map(
    (options.preloaded ?? []).map((l): [string, LoadedArtifact] => [l.entry.artifactPath, l]),
  );
  const loaded: LoadedArtifact[] = [];

  for (const entry of await ctx.registry.entries()) {
    const ready = preloaded.get(entry.artifactPath);
    if (ready) {
      loaded.push(ready);
      continue;
    }
    try {
      loaded.push(await loadArtifact(ctx, cache, entry));
    } catch (err) {
      if (!options.skipBroken || !(err instanceof ParseError)) throw err;
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Warning: skipping ${entry.relativePath}: ${message}`);
    }
  }
  return loaded;
}

function crossReferenceIssues(ctx: ValidationContext, scope: LoadedArtifact[]): Map<string, Issue[]> {
  const index = buildIdIndex(scope.flatMap((l) => l.definitions));
  const issues = validateCrossReferences(
    index,
    scope.flatMap((l) => l.references),
    {
      prefix: ctx.config.prefix,
      systems: ctx.config.systems,
      scopeKinds: new Set(scope.map((l) => l.entry.kind)),
      knownKinds: ctx.config.knownKinds,
    },
  );

  const byArtifact = new Map<string, Issue[]>();
  for (const { artifactPath, ...issue } of issues) {
    const list = byArtifact.get(artifactPath);
    if (list) {
      list.push(issue);
    } else {
      byArtifact.set(artifactPath, [issue]);
    }
  }
  return byArtifact;
}

function scoreArtifact(
  ctx: ValidationContext,
  loaded: LoadedArtifact,
  crossIssues: Map<string, Issue[]>,
  placeholders: RegExp[],
): ValidationResult {
  const { entry, template, artifact } = loaded;
  const strict = entry.strict || template.validationLevel === "STRICT";
  const structural = validateStructure(template, artifact, {
    prefix: ctx.config.prefix,
    systems: ctx.config.systems,
    strict,
    placeholders,
  });
  return score(entry.relativePath, [...structural, ...(crossIssues.get(entry.relativePath) ?? [])], {
    kind: entry.kind,
    scoring: ctx.config.scoring,
    strict,
  });
}

/**
 * Validate one registered artifact. Its own parse errors are fatal; other
 * registered artifacts only feed the ID index and are skipped when broken.
 */
export async function validateArtifact(ctx: ValidationContext, artifactPath: string): Promise<ValidationResult> {
  const cache: TemplateCache = new Map();
  const target = await loadRegistered(ctx, artifactPath, cache);
  const scope = await loadScope(ctx, { skipBroken: true, cache, preloaded: [target] });
  if (!scope.includes(target)) scope.push(target);

  const placeholders = compilePlaceholders(ctx.config.placeholders);
  return scoreArtifact(ctx, target, crossReferenceIssues(ctx, scope), placeholders);
}

/** Validate every registered artifact in one pass. Any parse error is fatal. */
export async function validateAll(ctx: ValidationContext): Promise<ValidationReport> {
  const scope = await loadScope(ctx, { skipBroken: false });
  const crossIssues = crossReferenceIssues(ctx, scope);
  const placeholders = compilePlaceholders(ctx.config.placeholders);

  const artifacts = scope.map((loaded) => scoreArtifact(ctx, loaded, crossIssues, placeholders));
  return {
    status: artifacts.every((r) => r.status === "PASS") ? "PASS" : "FAIL",
    artifacts,
  };
}
