import { readFile } from "node:fs/promises";
import { ConfigurationError, ParseError, isNotFound } from "../errors.js";
import { scanMarkers } from "../markers/scanner.js";
import type { MarkerNode } from "../markers/types.js";
import {
  extractDefinitions,
  extractInlineReferences,
  extractReferences,
  extractTasks,
  hasIdLabel,
} from "./extract.js";
import type { Artifact, ArtifactBlock } from "./types.js";

export interface ArtifactParseOptions {
  /** Marker namespace and ID prefix (e.g. `spd`). */
  prefix: string;
}

function toArtifactBlock(node: MarkerNode, prefix: string): ArtifactBlock {
  const { token, ownLines } = node;
  const block: ArtifactBlock = {
    blockType: token.blockType,
    name: token.name,
    attributes: { ...token.attributes },
    rawContent: node.contentLines.join("\n"),
    contentLines: node.contentLines,
    ownLines,
    startLine: node.startLine,
    endLine: node.endLine,
    definitions: [],
    references: [],
    malformed: [],
    tasks: [],
    children: node.children.map((child) => toArtifactBlock(child, prefix)),
  };

  switch (token.blockType) {
    case "id": {
      const { definitions, malformed } = extractDefinitions(ownLines);
      block.definitions = definitions;
      block.malformed = malformed;
      block.references = extractInlineReferences(
        ownLines.filter((l) => !hasIdLabel(l.text)),
        prefix,
      );
      const first = definitions[0];
      if (first?.hasCheckbox) block.checked = first.checked;
      break;
    }
    case "id-ref": {
      const { references, malformed } = extractReferences(ownLines);
      block.references = references;
      block.malformed = malformed;
      break;
    }
    case "task-list":
      block.tasks = extractTasks(ownLines);
      block.references = extractInlineReferences(ownLines, prefix);
      break;
    default:
      block.references = extractInlineReferences(ownLines, prefix);
  }

  return block;
}

function findTemplateFrontmatter(frontmatter: string | undefined): number | undefined {
  if (frontmatter === undefined) return undefined;
  const fmLines = frontmatter.split("\n");
  const idx = fmLines.findIndex((l) => /^template\s*:/.test(l));
  // frontmatter starts on line 2, after the opening ---
  return idx === -1 ? undefined : idx + 2;
}

/** Parse artifact text into a block tree. Unbalanced markers throw ParseError. */
export function parseArtifactText(
  text: string,
  path: string,
  options: ArtifactParseOptions,
): Artifact {
  try {
    const scan = scanMarkers(text, options.prefix);
    const templateFrontmatterLine = findTemplateFrontmatter(scan.frontmatter);
    return {
      path,
      lineCount: scan.lines.length,
      ...(templateFrontmatterLine !== undefined ? { templateFrontmatterLine } : {}),
      blocks: scan.roots.map((node) => toArtifactBlock(node, options.prefix)),
    };
  } catch (err) {
    if (err instanceof ParseError && err.path === undefined) err.path = path;
    throw err;
  }
}

/** Read and parse an artifact file. A missing file is a ConfigurationError. */
export async function parseArtifact(
  path: string,
  options: ArtifactParseOptions,
): Promise<Artifact> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      throw new ConfigurationError(`Artifact not found: ${path}`, path);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to read artifact: ${message}`, path);
  }
  return parseArtifactText(text, path, options);
}

/** Depth-first list of every block, document order. */
export function flattenBlocks(blocks: ArtifactBlock[]): ArtifactBlock[] {
  const out: ArtifactBlock[] = [];
  const visit = (list: ArtifactBlock[]): void => {
    for (const block of list) {
      out.push(block);
      visit(block.children);
    }
  };
  visit(blocks);
  return out;
}
