import type { Issue, ValidationReport, ValidationResult } from "../types.js";

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

function formatIssue(path: string, issue: Issue): string {
  const flag = issue.blocking ? " (blocking)" : "";
  return `- ${path}:${issue.line} [${issue.ruleId}]${flag} ${issue.message}`;
}

function isReport(result: ValidationResult | ValidationReport): result is ValidationReport {
  return "artifacts" in result;
}

/** Markdown summary of a validation run, one checkbox per artifact. */
export function formatHumanReport(result: ValidationResult | ValidationReport): string {
  const artifacts = isReport(result) ? result.artifacts : [result];
  const status = result.status === "PASS" ? "PASSED" : "FAILED";
  const lines: string[] = [];

  lines.push("## Validation Report");
  lines.push(`**Status:** ${status}`);
  lines.push(`**Artifacts:** ${artifacts.length}`);
  lines.push("");

  lines.push("### Artifacts");
  for (const artifact of artifacts) {
    const icon = artifact.status === "PASS" ? "[x]" : "[ ]";
    const { errors, warnings } = artifact.summary;
    let suffix = "";
    if (errors > 0 || warnings > 0) {
      suffix = `; ${plural(errors, "error")}, ${plural(warnings, "warning")}`;
    }
    lines.push(
      `- ${icon} ${artifact.artifactPath} (${artifact.kind}): ${artifact.status} ${artifact.score}/${artifact.threshold}${suffix}`,
    );
  }
  lines.push("");

  const sections: Array<["ERROR" | "WARNING", string]> = [
    ["ERROR", "### Errors"],
    ["WARNING", "### Warnings"],
  ];
  for (const [severity, heading] of sections) {
    const withIssues = artifacts.filter((a) => a.issues.some((i) => i.severity === severity));
    if (withIssues.length === 0) continue;
    lines.push(heading);
    for (const artifact of withIssues) {
      lines.push(`#### ${artifact.artifactPath}`);
      for (const issue of artifact.issues) {
        if (issue.severity === severity) lines.push(formatIssue(artifact.artifactPath, issue));
      }
      lines.push("");
    }
  }

  return lines.join("\n");
}
