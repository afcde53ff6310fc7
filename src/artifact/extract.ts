import type { SourceLine } from "../markers/types.js";
import type {
  MalformedIdLine,
  ParsedDefinition,
  ParsedReference,
  TaskItem,
} from "./types.js";

const ID_LABEL_RE = /\*\*ID\*\*:/;
const DEF_RE =
  /^(?:([-*]|\d+[.)])\s+)?(?:\[([ xX])\]\s*)?(?:`(p\d+)`\s*-\s*)?\*\*ID\*\*:\s*`([^`]+)`\s*$/;
const REF_TOKEN_RE = /^(?:\[([ xX])\]\s*(?:-\s*)?)?(?:`(p\d+)`\s*-\s*)?`([^`]+)`$/;
const LIST_ITEM_RE = /^(?:[-*]|\d+[.)])\s+/;
const TASK_RE = /^\s*(?:[-*]|\d+[.)])\s+\[([ xX])\]/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isChecked(mark: string | undefined): boolean {
  return mark !== undefined && mark.toLowerCase() === "x";
}

/** True when the line carries an `**ID**:` label (well-formed or not). */
export function hasIdLabel(text: string): boolean {
  return ID_LABEL_RE.test(text);
}

/** `**ID**:` lines of an `id` block. Lines in code fences are examples and skipped. */
export function extractDefinitions(lines: SourceLine[]): {
  definitions: ParsedDefinition[];
  malformed: MalformedIdLine[];
} {
  const definitions: ParsedDefinition[] = [];
  const malformed: MalformedIdLine[] = [];

  for (const { line, text, inFence } of lines) {
    if (inFence || !hasIdLabel(text)) continue;
    const trimmed = text.trim();
    const m = DEF_RE.exec(trimmed);
    if (!m) {
      malformed.push({ line, text: trimmed, reason: "Invalid ID definition line" });
      continue;
    }
    const [, listMarker, checkbox, priority, id] = m;
    if (checkbox !== undefined && listMarker === undefined) {
      malformed.push({ line, text: trimmed, reason: "Task checkbox must be in a list item" });
      continue;
    }
    definitions.push({
      id,
      line,
      checked: isChecked(checkbox),
      hasCheckbox: checkbox !== undefined,
      ...(priority !== undefined ? { priority } : {}),
    });
  }

  return { definitions, malformed };
}

/** Comma-separated ID tokens of an `id-ref` block, one or more per line. */
export function extractReferences(lines: SourceLine[]): {
  references: ParsedReference[];
  malformed: MalformedIdLine[];
} {
  const references: ParsedReference[] = [];
  const malformed: MalformedIdLine[] = [];

  for (const { line, text, inFence } of lines) {
    if (inFence) continue;
    const trimmed = text.trim();
    if (trimmed === "") continue;
    const listMarker = LIST_ITEM_RE.exec(trimmed);
    const body = listMarker ? trimmed.slice(listMarker[0].length) : trimmed;

    for (const token of body.split(",").map((part) => part.trim())) {
      if (token === "") continue;
      const m = REF_TOKEN_RE.exec(token);
      if (!m) {
        malformed.push({ line, text: token, reason: `Invalid ID reference "${token}"` });
        continue;
      }
      const [, checkbox, priority, id] = m;
      if (checkbox !== undefined && !listMarker) {
        malformed.push({ line, text: token, reason: "Task checkbox must be in a list item" });
        continue;
      }
      references.push({
        id,
        line,
        checked: isChecked(checkbox),
        hasCheckbox: checkbox !== undefined,
        ...(priority !== undefined ? { priority } : {}),
        source: "id-ref",
      });
    }
  }

  return { references, malformed };
}

/** Backticked `{prefix}-...` tokens in ordinary prose. */
export function extractInlineReferences(lines: SourceLine[], prefix: string): ParsedReference[] {
  const pattern = new RegExp("`(" + escapeRegExp(prefix) + "-[a-z0-9-]+)`", "g");
  const references: ParsedReference[] = [];
  for (const { line, text, inFence } of lines) {
    if (inFence) continue;
    for (const m of text.matchAll(pattern)) {
      references.push({
        id: m[1],
        line,
        checked: false,
        hasCheckbox: false,
        source: "inline",
      });
    }
  }
  return references;
}

/** Checkbox items of a task-list block. */
export function extractTasks(lines: SourceLine[]): TaskItem[] {
  const tasks: TaskItem[] = [];
  for (const { line, text, inFence } of lines) {
    if (inFence) continue;
    const m = TASK_RE.exec(text);
    if (m) tasks.push({ line, checked: isChecked(m[1]) });
  }
  return tasks;
}
