import type { Issue, ScoringConfig, ValidationResult } from "../types.js";

export interface ScoreOptions {
  kind: string;
  scoring: ScoringConfig;
  /** STRICT validation level: every error blocks. */
  strict: boolean;
}

function compareIssues(a: Issue, b: Issue): number {
  if (a.line !== b.line) return a.line - b.line;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  if (a.message !== b.message) return a.message < b.message ? -1 : 1;
  return 0;
}

/**
 * Score an artifact's issues. Pure and deterministic: the same issues and
 * scoring table always produce the same result, issue order included.
 *
 * PASS requires score >= threshold and no blocking error; a blocking error
 * fails the artifact whatever the score.
 */
export function score(
  artifactPath: string,
  issues: Issue[],
  options: ScoreOptions,
): ValidationResult {
  const { weights, threshold, blockingRules } = options.scoring;
  const blocking = new Set(blockingRules);

  let deduction = 0;
  let errors = 0;
  let warnings = 0;
  let blocked = false;

  const scored = [...issues].sort(compareIssues).map((issue): Issue => {
    const { blocking: _ignored, ...rest } = issue;
    const weight = weights[issue.category];
    if (issue.severity === "ERROR") {
      errors++;
      deduction += weight.error;
      if (options.strict || blocking.has(issue.ruleId)) {
        blocked = true;
        return { ...rest, blocking: true };
      }
    } else {
      warnings++;
      deduction += weight.warning;
    }
    return rest;
  });

  const value = Math.max(0, 100 - deduction);
  return {
    artifactPath,
    kind: options.kind,
    status: value >= threshold && !blocked ? "PASS" : "FAIL",
    score: value,
    threshold,
    summary: { errors, warnings },
    issues: scored,
  };
}
