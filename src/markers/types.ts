export const HEADING_BLOCK_TYPES = ["#", "##", "###", "####", "#####", "######"] as const;

/** Every block type the marker grammar accepts. Anything else fails parsing. */
export const BLOCK_TYPES = [
  ...HEADING_BLOCK_TYPES,
  "paragraph",
  "list",
  "numbered-list",
  "task-list",
  "table",
  "code",
  "free",
  "id",
  "id-ref",
  "link",
  "image",
] as const;

export type HeadingBlockType = (typeof HEADING_BLOCK_TYPES)[number];
export type BlockType = (typeof BLOCK_TYPES)[number];

export function isBlockType(value: string): value is BlockType {
  return (BLOCK_TYPES as readonly string[]).includes(value);
}

export function isHeadingBlockType(value: BlockType): value is HeadingBlockType {
  return (HEADING_BLOCK_TYPES as readonly string[]).includes(value);
}

/** A parsed `<!-- prefix:type:name attr="value" -->` comment. */
export interface MarkerToken {
  prefix: string;
  blockType: BlockType;
  name: string;
  /** Attributes in source order. */
  attributes: Record<string, string>;
  selfClosing: boolean;
  line: number;
}

/** A physical line of the source, 1-based. */
export interface SourceLine {
  line: number;
  text: string;
  /** Inside a fenced code block (fence delimiters included). */
  inFence: boolean;
}

/** A paired marker span with its nested spans. */
export interface MarkerNode {
  token: MarkerToken;
  /** Line of the opening marker. */
  startLine: number;
  /** Line of the closing marker (equal to startLine when self-closing). */
  endLine: number;
  /** Every line strictly between the two markers. */
  contentLines: string[];
  /** Content lines not covered by a nested span. */
  ownLines: SourceLine[];
  children: MarkerNode[];
}

/** Output of scanning one Markdown file. */
export interface ScanResult {
  /** Raw YAML between leading `---` fences, when present. */
  frontmatter?: string;
  /** First line of the frontmatter block, 1-based. */
  frontmatterLine?: number;
  lines: string[];
  roots: MarkerNode[];
}

export function blockLabel(block: { blockType: BlockType; name: string }): string {
  return `${block.blockType}:${block.name}`;
}
