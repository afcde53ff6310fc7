import type { RuleId } from "./validation/rules.js";

export type { RuleId };

/** Issue severity. */
export type Severity = "ERROR" | "WARNING";

/** Scoring category an issue deducts from. */
export type IssueCategory =
  | "structural"
  | "idFormat"
  | "crossReference"
  | "placeholder";

/** A single validation finding. */
export interface Issue {
  severity: Severity;
  line: number;
  message: string;
  ruleId: RuleId;
  category: IssueCategory;
  /** Set by the reporter when this error alone forces FAIL. */
  blocking?: boolean;
}

/** Issue raised by cross-artifact validation, attributed to one artifact. */
export interface CrossReferenceIssue extends Issue {
  artifactPath: string;
}

/** A defined ID, located in one artifact. */
export interface IdDefinition {
  id: string;
  artifactPath: string;
  artifactKind: string;
  line: number;
  checked: boolean;
  /** Whether the definition line carries a `[ ]`/`[x]` checkbox at all. */
  hasCheckbox: boolean;
  priority?: string;
  /** Name of the `id` block the definition sits in (e.g. `actor`, `fr`). */
  idKind: string;
  /** Artifact kinds that must reference this ID (sorted). */
  coveredBy: string[];
}

/** Where a reference was found: an `id-ref` block or a backticked mention in prose. */
export type ReferenceSource = "id-ref" | "inline";

/** A reference to an ID, located in one artifact. */
export interface IdReference {
  id: string;
  artifactPath: string;
  artifactKind: string;
  line: number;
  checked: boolean;
  hasCheckbox: boolean;
  priority?: string;
  source: ReferenceSource;
}

export type ValidationStatus = "PASS" | "FAIL";

/** Scored result for one artifact. */
export interface ValidationResult {
  artifactPath: string;
  kind: string;
  status: ValidationStatus;
  score: number;
  threshold: number;
  summary: {
    errors: number;
    warnings: number;
  };
  issues: Issue[];
}

/** Result of validating every registered artifact. */
export interface ValidationReport {
  status: ValidationStatus;
  artifacts: ValidationResult[];
}

/** Deduction per severity for one category. */
export interface CategoryWeights {
  error: number;
  warning: number;
}

/** Scoring configuration from .tracemark.json */
export interface ScoringConfig {
  threshold: number;
  weights: Record<IssueCategory, CategoryWeights>;
  blockingRules: RuleId[];
}

export type ValidationLevel = "STRICT" | "STANDARD";

/** One registered artifact entry from .tracemark.json */
export interface ArtifactEntryConfig {
  path: string;
  kind: string;
  template?: string;
  validationLevel: ValidationLevel;
}

/** Configuration from .tracemark.json */
export interface TracemarkConfig {
  prefix: string;
  systems: string[];
  templatesDir: string;
  templates: Record<string, string>;
  artifacts: ArtifactEntryConfig[];
  knownKinds: string[];
  placeholders: string[];
  scoring: ScoringConfig;
}
