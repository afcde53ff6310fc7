import { ParseError } from "../errors.js";
import {
  isBlockType,
  type MarkerNode,
  type MarkerToken,
  type ScanResult,
  type SourceLine,
} from "./types.js";

const CODE_FENCE_RE = /^\s*```/;
const ATTR_RE = /\s*([A-Za-z0-9_-]+)\s*=\s*"([^"]*)"/y;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function markerPattern(prefix: string): RegExp {
  return new RegExp(
    `<!--\\s*${escapeRegExp(prefix)}:([^\\s>]+?)(\\s+[^>]*?)?\\s*(/)?-->`,
    "g",
  );
}

/** Split file content into lines, accepting LF and CRLF. */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Parse the `key="value"` section of a marker.
 * Anything left over that is not whitespace is malformed.
 */
export function parseAttributes(raw: string, line: number): Record<string, string> {
  const attributes: Record<string, string> = {};
  let pos = 0;
  while (pos < raw.length) {
    if (raw.slice(pos).trim() === "") break;
    ATTR_RE.lastIndex = pos;
    const m = ATTR_RE.exec(raw);
    if (!m) {
      throw new ParseError(
        "MALFORMED_ATTRIBUTE",
        `Malformed marker attribute near "${raw.slice(pos).trim()}"`,
        line,
      );
    }
    attributes[m[1]] = m[2];
    pos = ATTR_RE.lastIndex;
  }
  return attributes;
}

/** Extract every marker token on one line, in order of appearance. */
export function tokenizeLine(text: string, line: number, prefix: string): MarkerToken[] {
  const tokens: MarkerToken[] = [];
  for (const m of text.matchAll(markerPattern(prefix))) {
    const head = m[1].split(":");
    if (head.length > 2 || head.some((part) => part === "")) {
      throw new ParseError("MALFORMED_ATTRIBUTE", `Malformed marker "${m[0]}"`, line);
    }
    const [rawType, name] = head.length === 2 ? [head[0], head[1]] : ["free", head[0]];
    if (!isBlockType(rawType)) {
      throw new ParseError("UNKNOWN_BLOCK_TYPE", `Unknown block type "${rawType}"`, line);
    }
    tokens.push({
      prefix,
      blockType: rawType,
      name,
      attributes: parseAttributes(m[2] ?? "", line),
      selfClosing: m[3] === "/",
      line,
    });
  }
  return tokens;
}

/** Locate a leading `---` YAML block. Returns the index of the closing fence, or -1. */
function findFrontmatterEnd(lines: string[]): number {
  if (lines.length === 0 || lines[0].trim() !== "---") return -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === "---") return i;
  }
  throw new ParseError("INVALID_FRONTMATTER", "Missing YAML frontmatter closing ---", 1);
}

function sameMarker(node: MarkerNode, token: MarkerToken): boolean {
  return node.token.blockType === token.blockType && node.token.name === token.name;
}

function computeOwnLines(node: MarkerNode, sourceLines: SourceLine[]): void {
  const covered = new Set<number>();
  for (const child of node.children) {
    for (let l = child.startLine; l <= child.endLine; l++) covered.add(l);
  }
  node.ownLines = [];
  for (let l = node.startLine + 1; l < node.endLine; l++) {
    if (!covered.has(l)) node.ownLines.push(sourceLines[l - 1]);
  }
  for (const child of node.children) computeOwnLines(child, sourceLines);
}

/**
 * Scan a Markdown document for paired markers.
 *
 * Single forward pass with a stack of open markers: a marker equal to the top
 * closes it, a marker equal to one deeper in the stack is a crossing (error),
 * anything else opens a new span nested under the top. Markers inside fenced
 * code blocks and in the leading frontmatter are ignored.
 */
export function scanMarkers(text: string, prefix: string): ScanResult {
  const lines = splitLines(text);
  const fmEnd = findFrontmatterEnd(lines);
  const result: ScanResult = { lines, roots: [] };
  if (fmEnd !== -1) {
    result.frontmatter = lines.slice(1, fmEnd).join("\n");
    result.frontmatterLine = 1;
  }

  const sourceLines: SourceLine[] = [];
  const stack: MarkerNode[] = [];
  let inFence = false;

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    const line = i + 1;
    const isFence = CODE_FENCE_RE.test(text);
    sourceLines.push({ line, text, inFence: inFence || isFence });
    if (isFence) {
      inFence = !inFence;
      continue;
    }
    if (inFence || i <= fmEnd) continue;

    for (const token of tokenizeLine(text, line, prefix)) {
      const top = stack[stack.length - 1];
      const siblings = top ? top.children : result.roots;

      if (token.selfClosing) {
        siblings.push({
          token,
          startLine: line,
          endLine: line,
          contentLines: [],
          ownLines: [],
          children: [],
        });
        continue;
      }

      if (top && sameMarker(top, token)) {
        if (top.startLine === line) {
          throw new ParseError(
            "UNBALANCED_MARKERS",
            `Marker ${token.blockType}:${token.name} opens and closes on line ${line}; put its content on the lines between the markers, or use a self-closing marker`,
            line,
          );
        }
        top.endLine = line;
        top.contentLines = lines.slice(top.startLine, line - 1);
        stack.pop();
        continue;
      }

      const crossed = stack.find((open) => sameMarker(open, token));
      if (crossed && top) {
        throw new ParseError(
          "UNBALANCED_MARKERS",
          `Marker ${token.blockType}:${token.name} closes the span opened at line ${crossed.startLine} while ${top.token.blockType}:${top.token.name} (line ${top.startLine}) is still open`,
          line,
        );
      }

      const node: MarkerNode = {
        token,
        startLine: line,
        endLine: line,
        contentLines: [],
        ownLines: [],
        children: [],
      };
      siblings.push(node);
      stack.push(node);
    }
  }

  // outermost unclosed marker
  const unclosed = stack[0];
  if (unclosed) {
    throw new ParseError(
      "UNBALANCED_MARKERS",
      `Marker ${unclosed.token.blockType}:${unclosed.token.name} is never closed`,
      unclosed.startLine,
    );
  }

  for (const root of result.roots) computeOwnLines(root, sourceLines);
  return result;
}
