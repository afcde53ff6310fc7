import { flattenBlocks } from "../artifact/parser.js";
import { hasIdLabel } from "../artifact/extract.js";
import type { Artifact, ArtifactBlock } from "../artifact/types.js";
import { blockLabel } from "../markers/types.js";
import type { Template, TemplateBlock } from "../template/types.js";
import type { Issue } from "../types.js";
import { validateBlockContent } from "./content.js";
import { checkIdFormat, checkReferenceFormat, type IdFormatOptions } from "./id-format.js";
import { makeIssue } from "./rules.js";

export interface StructureOptions extends IdFormatOptions {
  /** STRICT validation level: ordering problems become errors. */
  strict: boolean;
  /** Compiled placeholder patterns. */
  placeholders: readonly RegExp[];
}

function sameKey(tpl: TemplateBlock, block: ArtifactBlock): boolean {
  return tpl.blockType === block.blockType && tpl.name === block.name;
}

function rangeOf(block: ArtifactBlock): string {
  return `${blockLabel(block)} (lines ${block.startLine}-${block.endLine})`;
}

/** Walks the template tree and the artifact tree in parallel, one level at a time. */
class StructureWalker {
  readonly issues: Issue[] = [];
  private readonly parentOf = new Map<TemplateBlock, TemplateBlock>();
  private readonly allTemplateBlocks: TemplateBlock[] = [];
  private readonly taskKinds = new Set<string>();

  constructor(
    private readonly template: Template,
    private readonly options: StructureOptions,
  ) {
    const index = (block: TemplateBlock): void => {
      for (const child of block.children) {
        this.parentOf.set(child, block);
        this.allTemplateBlocks.push(child);
        if (child.blockType === "id" && child.has.includes("task")) this.taskKinds.add(child.name);
        index(child);
      }
    };
    index(template.root);
  }

  walk(expected: readonly TemplateBlock[], actual: ArtifactBlock[], parent: ArtifactBlock | null): void {
    const counts = new Map<number, number>();
    let lastIndex = -1;

    for (const block of actual) {
      const candidates = expected
        .map((tpl, i) => (sameKey(tpl, block) ? i : -1))
        .filter((i) => i !== -1);

      if (candidates.length === 0) {
        this.reportUnmatched(block);
        continue;
      }

      const index =
        candidates.find((i) => i >= lastIndex && (expected[i].repeatable || !counts.has(i))) ??
        candidates.find((i) => i >= lastIndex) ??
        candidates[0];
      const tpl = expected[index];

      if (index < lastIndex) {
        this.issues.push(
          makeIssue(
            "OUT_OF_ORDER_BLOCK",
            block.startLine,
            `Block ${blockLabel(block)} is out of order: the template places it before ${blockLabel(expected[lastIndex])}`,
            this.options.strict ? "ERROR" : "WARNING",
          ),
        );
      } else {
        lastIndex = index;
      }

      const seen = counts.get(index) ?? 0;
      if (seen > 0 && !tpl.repeatable) {
        this.issues.push(
          makeIssue(
            "DUPLICATE_BLOCK",
            block.startLine,
            `Block ${blockLabel(block)} must appear only once${parent ? ` in ${rangeOf(parent)}` : ""}`,
          ),
        );
      }
      counts.set(index, seen + 1);

      this.issues.push(...validateBlockContent(tpl, block));
      if (tpl.blockType === "id") this.checkIdBlock(tpl, block);
      if (tpl.blockType === "id-ref") this.checkRefBlock(tpl, block);

      this.walk(tpl.children, block.children, block);
    }

    expected.forEach((tpl, i) => {
      if (!tpl.required || counts.has(i)) return;
      this.issues.push(
        makeIssue(
          "MISSING_REQUIRED_BLOCK",
          parent?.startLine ?? 1,
          `Required block ${blockLabel(tpl)} is missing${parent ? ` in ${rangeOf(parent)}` : ""}`,
        ),
      );
    });
  }

  private reportUnmatched(block: ArtifactBlock): void {
    const elsewhere = this.allTemplateBlocks.find((tpl) => sameKey(tpl, block));
    if (elsewhere) {
      const owner = this.parentOf.get(elsewhere);
      const where =
        owner && owner !== this.template.root ? `inside ${blockLabel(owner)}` : "at the document root";
      this.issues.push(
        makeIssue(
          "MISPLACED_BLOCK",
          block.startLine,
          `Block ${blockLabel(block)} is not expected here; the template places it ${where}`,
        ),
      );
      return;
    }

    const policy = this.template.unknownSections;
    if (policy === "allow") return;
    this.issues.push(
      makeIssue(
        "UNEXPECTED_BLOCK",
        block.startLine,
        `Block ${blockLabel(block)} is not defined by the ${this.template.kind} template`,
        policy === "error" ? "ERROR" : "WARNING",
      ),
    );
  }

  private checkIdBlock(tpl: TemplateBlock, block: ArtifactBlock): void {
    const label = blockLabel(block);
    const labelled = block.ownLines.filter((l) => !l.inFence && hasIdLabel(l.text));
    if (labelled.length === 0) {
      this.issues.push(makeIssue("MISSING_ID", block.startLine, `${label}: ID block has no **ID**: line`));
    }

    for (const bad of block.malformed) {
      this.issues.push(makeIssue("INVALID_ID_FORMAT", bad.line, `${label}: ${bad.reason}: ${bad.text}`));
    }

    for (const def of block.definitions) {
      const problem = checkIdFormat(def.id, this.options, tpl.name);
      if (problem) this.issues.push(makeIssue("INVALID_ID_FORMAT", def.line, problem));
      if (tpl.has.includes("priority") && def.priority === undefined) {
        this.issues.push(makeIssue("MISSING_PRIORITY", def.line, `ID ${def.id} is missing its priority (\`p1\` - ...)`));
      }
      if (tpl.has.includes("task") && !def.hasCheckbox) {
        this.issues.push(makeIssue("MISSING_TASK_CHECKBOX", def.line, `ID ${def.id} is missing its task checkbox (- [ ] ...)`));
      }
    }

    if (tpl.has.includes("task")) this.checkTaskStatus(block);
  }

  /** A `has="task"` ID is done exactly when every nested task and nested task ID is done. */
  private checkTaskStatus(block: ArtifactBlock): void {
    const nested = flattenBlocks(block.children);
    const states = [
      ...nested.flatMap((b) => b.tasks.map((t) => t.checked)),
      ...nested
        .filter((b) => b.blockType === "id" && this.taskKinds.has(b.name))
        .flatMap((b) => b.definitions.map((d) => d.checked)),
    ];
    if (states.length === 0) return;
    const allDone = states.every(Boolean);

    for (const def of block.definitions) {
      if (allDone && !def.checked) {
        this.issues.push(
          makeIssue("TASK_STATUS_MISMATCH", def.line, `All nested tasks are done but ID ${def.id} is not checked`),
        );
      }
      if (!allDone && def.checked) {
        this.issues.push(
          makeIssue("TASK_STATUS_MISMATCH", def.line, `ID ${def.id} is checked but its nested tasks are not all done`),
        );
      }
    }
  }

  private checkRefBlock(tpl: TemplateBlock, block: ArtifactBlock): void {
    const label = blockLabel(block);
    if (block.references.length === 0 && block.malformed.length === 0) {
      this.issues.push(makeIssue("INVALID_BLOCK_CONTENT", block.startLine, `${label}: ID reference block is empty`));
    }
    for (const bad of block.malformed) {
      this.issues.push(makeIssue("INVALID_ID_FORMAT", bad.line, `${label}: ${bad.reason}`));
    }
    for (const ref of block.references) {
      const problem = checkReferenceFormat(ref.id, this.options);
      if (problem) this.issues.push(makeIssue("INVALID_ID_FORMAT", ref.line, problem));
      if (tpl.has.includes("priority") && ref.priority === undefined) {
        this.issues.push(makeIssue("MISSING_PRIORITY", ref.line, `Reference ${ref.id} is missing its priority`));
      }
    }
  }
}

function findPlaceholders(artifact: Artifact, patterns: readonly RegExp[]): Issue[] {
  const issues: Issue[] = [];
  if (patterns.length === 0) return issues;
  for (const block of flattenBlocks(artifact.blocks)) {
    for (const { line, text, inFence } of block.ownLines) {
      if (inFence) continue;
      for (const pattern of patterns) {
        const m = pattern.exec(text);
        if (m) {
          issues.push(makeIssue("PLACEHOLDER_CONTENT", line, `Placeholder content "${m[0]}" left in ${blockLabel(block)}`));
          break;
        }
      }
    }
  }
  return issues;
}

/** Compile placeholder sources once per run. Patterns are matched without the `g` flag. */
export function compilePlaceholders(sources: readonly string[]): RegExp[] {
  return sources.map((source) => new RegExp(source));
}

/**
 * Validate an artifact's block tree against its template.
 * Every detectable problem is reported; nothing short-circuits.
 */
export function validateStructure(
  template: Template,
  artifact: Artifact,
  options: StructureOptions,
): Issue[] {
  const walker = new StructureWalker(template, options);

  if (artifact.templateFrontmatterLine !== undefined) {
    walker.issues.push(
      makeIssue(
        "TEMPLATE_FRONTMATTER_IN_ARTIFACT",
        artifact.templateFrontmatterLine,
        "Artifact contains template frontmatter (template:); it belongs only in template files",
      ),
    );
  }

  walker.walk(template.root.children, artifact.blocks, null);
  return [...walker.issues, ...findPlaceholders(artifact, options.placeholders)];
}
