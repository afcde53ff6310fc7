import type { BlockType, SourceLine } from "../markers/types.js";
import type { ReferenceSource } from "../types.js";

/** An `**ID**:` line found in an `id` block. */
export interface ParsedDefinition {
  id: string;
  line: number;
  checked: boolean;
  hasCheckbox: boolean;
  priority?: string;
}

/** An ID token found in an `id-ref` block or backticked in prose. */
export interface ParsedReference {
  id: string;
  line: number;
  checked: boolean;
  hasCheckbox: boolean;
  priority?: string;
  source: ReferenceSource;
}

/** A line that looks like an ID definition or reference but does not parse. */
export interface MalformedIdLine {
  line: number;
  text: string;
  reason: string;
}

/** A `- [ ]` / `- [x]` item in a task-list block. */
export interface TaskItem {
  line: number;
  checked: boolean;
}

/** Node of the actual-content tree. Rebuilt from disk on every run. */
export interface ArtifactBlock {
  blockType: BlockType;
  name: string;
  attributes: Record<string, string>;
  /** Content between the markers, joined with `\n`. */
  rawContent: string;
  contentLines: string[];
  /** Content lines not inside a nested block. */
  ownLines: SourceLine[];
  /** Line of the opening marker. */
  startLine: number;
  /** Line of the closing marker. */
  endLine: number;
  /** Checkbox state of the first definition, for `id` blocks that carry one. */
  checked?: boolean;
  definitions: ParsedDefinition[];
  references: ParsedReference[];
  malformed: MalformedIdLine[];
  tasks: TaskItem[];
  children: ArtifactBlock[];
}

/** A parsed artifact file. */
export interface Artifact {
  path: string;
  lineCount: number;
  /** Line of a `template:` key in the artifact's frontmatter, if any. */
  templateFrontmatterLine?: number;
  blocks: ArtifactBlock[];
}
