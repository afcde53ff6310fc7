import type { ArtifactBlock } from "../artifact/types.js";
import { blockLabel, isHeadingBlockType } from "../markers/types.js";
import type { TemplateBlock } from "../template/types.js";
import type { Issue } from "../types.js";
import { makeIssue } from "./rules.js";

const CODE_FENCE_RE = /^\s*```/;
const BULLET_RE = /^\s*[-*]\s+/;
const NUMBERED_RE = /^\s*\d+[.)]\s+/;
const TASK_ITEM_RE = /^\s*[-*]\s+\[[ xX]\]/;
const TABLE_SEPARATOR_CELL_RE = /^:?-+:?$/;

function nonEmpty(lines: string[]): string[] {
  return lines.filter((l) => l.trim() !== "");
}

function splitRow(row: string): string[] {
  return row
    .trim()
    .replace(/^\|/, "")
    .replace(/\|$/, "")
    .split("|")
    .map((cell) => cell.trim());
}

function invalid(block: ArtifactBlock, message: string): Issue {
  return makeIssue("INVALID_BLOCK_CONTENT", block.startLine, `${blockLabel(block)}: ${message}`);
}

function checkList(tpl: TemplateBlock, lines: string[]): string | null {
  if (lines.length === 0) return "list is empty";
  for (const line of lines) {
    if (tpl.blockType === "list" && !BULLET_RE.test(line)) {
      // continuation lines of a bullet are indented
      if (/^\s{2,}\S/.test(line)) continue;
      return "expected a bullet list";
    }
    if (tpl.blockType === "numbered-list" && !NUMBERED_RE.test(line)) {
      if (/^\s{2,}\S/.test(line)) continue;
      return "expected a numbered list";
    }
    if (tpl.blockType === "task-list") {
      if (!TASK_ITEM_RE.test(line)) return "expected a task list (- [ ] item)";
      if (tpl.has.includes("priority") && !line.includes("`p")) {
        return "task item missing priority";
      }
    }
  }
  return null;
}

function checkTable(lines: string[]): string | null {
  if (lines.length < 2) return "table must have a header and a separator";
  const [header, separator, ...rows] = lines;
  if (!header.includes("|") || !separator.includes("|")) {
    return "invalid table header or separator";
  }
  const columns = splitRow(header).length;
  const sepCells = splitRow(separator);
  if (sepCells.length !== columns || sepCells.some((c) => !TABLE_SEPARATOR_CELL_RE.test(c))) {
    return "table separator does not match the header columns";
  }
  let dataRows = 0;
  for (const row of rows) {
    if (!row.trim().startsWith("|")) continue;
    if (splitRow(row).length !== columns) return "table row column count mismatch";
    dataRows++;
  }
  if (dataRows === 0) return "table must have at least one data row";
  return null;
}

function checkCode(lines: string[]): string | null {
  const content = nonEmpty(lines);
  if (content.length === 0 || !CODE_FENCE_RE.test(content[0])) {
    return "code block must start with ```";
  }
  if (!content.slice(1).some((l) => CODE_FENCE_RE.test(l))) {
    return "code fence must be closed";
  }
  return null;
}

/**
 * Check that an artifact block's own content has the shape its template block
 * type promises. `id`, `id-ref` and `free` blocks are checked elsewhere or not at all.
 */
export function validateBlockContent(tpl: TemplateBlock, block: ArtifactBlock): Issue[] {
  const own = nonEmpty(block.ownLines.filter((l) => !l.inFence).map((l) => l.text));
  let problem: string | null = null;

  if (isHeadingBlockType(tpl.blockType)) {
    if (own.length === 0) {
      problem = "heading is empty";
    } else if (!own[0].trimStart().startsWith(`${tpl.blockType} `)) {
      problem = `expected a level ${tpl.blockType.length} heading`;
    }
  } else {
    switch (tpl.blockType) {
      case "paragraph":
        if (own.length === 0) problem = "paragraph is empty";
        break;
      case "list":
      case "numbered-list":
      case "task-list":
        problem = checkList(tpl, own);
        break;
      case "table":
        problem = checkTable(own);
        break;
      case "code":
        problem = checkCode(block.contentLines);
        break;
      case "link":
        if (own.length === 0 || !own[0].includes("[") || !own[0].includes("](")) {
          problem = "expected a Markdown link";
        }
        break;
      case "image":
        if (own.length === 0 || !own[0].trimStart().startsWith("![")) {
          problem = "expected a Markdown image";
        }
        break;
      default:
        break;
    }
  }

  return problem ? [invalid(block, problem)] : [];
}
