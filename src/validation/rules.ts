import type { Issue, IssueCategory, Severity } from "../types.js";

export const RULE_IDS = [
  "MISSING_REQUIRED_BLOCK",
  "DUPLICATE_BLOCK",
  "OUT_OF_ORDER_BLOCK",
  "UNEXPECTED_BLOCK",
  "MISPLACED_BLOCK",
  "INVALID_BLOCK_CONTENT",
  "TASK_STATUS_MISMATCH",
  "TEMPLATE_FRONTMATTER_IN_ARTIFACT",
  "MISSING_ID",
  "INVALID_ID_FORMAT",
  "MISSING_PRIORITY",
  "MISSING_TASK_CHECKBOX",
  "PLACEHOLDER_CONTENT",
  "UNRESOLVED_REFERENCE",
  "STALE_ID_REFERENCE",
  "MISSING_COVERAGE",
  "COVERAGE_NOT_IN_SCOPE",
  "CHECKBOX_MISMATCH",
  "DUPLICATE_DEFINITION",
  "UNKNOWN_ID_KIND",
] as const;

/** Stable rule identifiers; tooling filters and suppresses by these. */
export type RuleId = (typeof RULE_IDS)[number];

interface RuleDef {
  category: IssueCategory;
  severity: Severity;
}

/** Default category and severity per rule. */
export const RULES: Record<RuleId, RuleDef> = {
  MISSING_REQUIRED_BLOCK: { category: "structural", severity: "ERROR" },
  DUPLICATE_BLOCK: { category: "structural", severity: "ERROR" },
  OUT_OF_ORDER_BLOCK: { category: "structural", severity: "WARNING" },
  UNEXPECTED_BLOCK: { category: "structural", severity: "WARNING" },
  MISPLACED_BLOCK: { category: "structural", severity: "ERROR" },
  INVALID_BLOCK_CONTENT: { category: "structural", severity: "ERROR" },
  TASK_STATUS_MISMATCH: { category: "structural", severity: "ERROR" },
  TEMPLATE_FRONTMATTER_IN_ARTIFACT: { category: "structural", severity: "ERROR" },
  MISSING_ID: { category: "idFormat", severity: "ERROR" },
  INVALID_ID_FORMAT: { category: "idFormat", severity: "ERROR" },
  MISSING_PRIORITY: { category: "idFormat", severity: "ERROR" },
  MISSING_TASK_CHECKBOX: { category: "idFormat", severity: "ERROR" },
  PLACEHOLDER_CONTENT: { category: "placeholder", severity: "WARNING" },
  UNRESOLVED_REFERENCE: { category: "crossReference", severity: "ERROR" },
  STALE_ID_REFERENCE: { category: "crossReference", severity: "ERROR" },
  MISSING_COVERAGE: { category: "crossReference", severity: "ERROR" },
  COVERAGE_NOT_IN_SCOPE: { category: "crossReference", severity: "WARNING" },
  CHECKBOX_MISMATCH: { category: "crossReference", severity: "ERROR" },
  DUPLICATE_DEFINITION: { category: "crossReference", severity: "ERROR" },
  UNKNOWN_ID_KIND: { category: "crossReference", severity: "WARNING" },
};

/** Build an issue with the rule's default category and severity. */
export function makeIssue(
  ruleId: RuleId,
  line: number,
  message: string,
  severity: Severity = RULES[ruleId].severity,
): Issue {
  return { severity, line, message, ruleId, category: RULES[ruleId].category };
}
