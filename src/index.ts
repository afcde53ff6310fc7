// Types (re-export as types)
export type {
  Severity,
  IssueCategory,
  Issue,
  CrossReferenceIssue,
  IdDefinition,
  IdReference,
  ReferenceSource,
  ValidationStatus,
  ValidationResult,
  ValidationReport,
  CategoryWeights,
  ScoringConfig,
  ValidationLevel,
  ArtifactEntryConfig,
  TracemarkConfig,
  RuleId,
} from "./types.js";
export type { BlockType, MarkerToken, MarkerNode, ScanResult, SourceLine } from "./markers/types.js";
export type { Template, TemplateBlock, TemplateVersion, UnknownSectionsPolicy } from "./template/types.js";
export type { Artifact, ArtifactBlock, ParsedDefinition, ParsedReference } from "./artifact/types.js";
export type { ErrorPayload, ParseErrorReason } from "./errors.js";
export type { RegisteredArtifact, Registry } from "./registry/adapter.js";
export type { IdIndex, CrossReferenceRules } from "./validation/cross-refs.js";
export type { StructureOptions } from "./validation/structure.js";
export type { ParsedId, IdFormatOptions } from "./validation/id-format.js";
export type { ScoreOptions } from "./reporter/score.js";
export type { ValidationContext, LoadedArtifact } from "./validation/pipeline.js";
export type { ListIdsFilters, KindSummary, WhereUsedResult } from "./query/ids.js";

// Errors
export { ParseError, ConfigurationError, toErrorPayload } from "./errors.js";

// Config
export { loadConfig, CONFIG_FILENAME } from "./config/loader.js";
export { tracemarkConfigSchema, DEFAULT_PLACEHOLDERS } from "./config/schema.js";
export { createRegistry } from "./registry/adapter.js";

// Parsers
export { scanMarkers } from "./markers/scanner.js";
export { BLOCK_TYPES, blockLabel } from "./markers/types.js";
export { parseTemplate, parseTemplateText, flattenTemplate, SUPPORTED_TEMPLATE_VERSION } from "./template/parser.js";
export { parseArtifact, parseArtifactText, flattenBlocks } from "./artifact/parser.js";

// Validation
export { RULE_IDS, RULES } from "./validation/rules.js";
export { parseId, baseId, checkIdFormat, checkReferenceFormat, isValidIdFormat } from "./validation/id-format.js";
export { validateStructure, compilePlaceholders } from "./validation/structure.js";
export { buildIdIndex, validateCrossReferences } from "./validation/cross-refs.js";
export { createContext, validateArtifact, validateAll, loadScope, loadRegistered } from "./validation/pipeline.js";

// Reporter
export { score } from "./reporter/score.js";
export { formatJsonReport } from "./reporter/json.js";
export { formatHumanReport } from "./reporter/human.js";

// Queries
export { listIds, whereDefined, whereUsed, listKinds } from "./query/ids.js";
