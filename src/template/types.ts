import type { BlockType } from "../markers/types.js";
import type { ValidationLevel } from "../types.js";

/** How the structural validator treats artifact blocks absent from the template. */
export type UnknownSectionsPolicy = "error" | "warn" | "allow";

export interface TemplateVersion {
  major: number;
  minor: number;
}

/** Node of the expected-schema tree. Immutable once the template is loaded. */
export interface TemplateBlock {
  readonly blockType: BlockType;
  readonly name: string;
  readonly required: boolean;
  /** `repeat="many"`: zero or more instances, each validated on its own. */
  readonly repeatable: boolean;
  /** ID category for `id` / `id-ref` blocks (the block name). */
  readonly idKind?: string;
  /** Artifact kinds that must reference IDs defined here (`covered_by`). */
  readonly coveredBy: readonly string[];
  /** Extra ID features required here (`has="priority,task"`). */
  readonly has: readonly string[];
  readonly attributes: Readonly<Record<string, string>>;
  readonly line: number;
  readonly endLine: number;
  readonly children: readonly TemplateBlock[];
}

/** Parsed template: expected-schema tree plus frontmatter metadata. */
export interface Template {
  readonly path: string;
  readonly kind: string;
  readonly version: TemplateVersion;
  readonly unknownSections: UnknownSectionsPolicy;
  readonly validationLevel?: ValidationLevel;
  /** Synthetic document node; its children are the top-level blocks. */
  readonly root: TemplateBlock;
}
