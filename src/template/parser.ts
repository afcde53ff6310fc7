import { readFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { parse as yamlParse } from "yaml";
import { ConfigurationError, ParseError, isNotFound } from "../errors.js";
import { scanMarkers } from "../markers/scanner.js";
import type { MarkerNode } from "../markers/types.js";
import { markerFlagsSchema, templateFrontmatterSchema } from "./schemas.js";
import type { Template, TemplateBlock, TemplateVersion } from "./types.js";

/** Highest template format this parser understands. */
export const SUPPORTED_TEMPLATE_VERSION: TemplateVersion = { major: 1, minor: 0 };

export interface TemplateParseOptions {
  prefix: string;
  /** Kind to use when neither frontmatter nor path names one. */
  kind?: string;
}

function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function toTemplateBlock(node: MarkerNode): TemplateBlock {
  const { token } = node;
  const flags = markerFlagsSchema.safeParse({
    required: token.attributes.required,
    repeat: token.attributes.repeat,
  });
  if (!flags.success) {
    throw new ParseError(
      "MALFORMED_ATTRIBUTE",
      `Marker ${token.blockType}:${token.name} has an invalid required/repeat value (required must be true|false, repeat must be one|many)`,
      node.startLine,
    );
  }
  if (token.blockType === "id" && token.name.includes("-")) {
    throw new ParseError(
      "MALFORMED_ATTRIBUTE",
      `ID kind "${token.name}" must be a single word (no hyphens)`,
      node.startLine,
    );
  }

  const isIdBlock = token.blockType === "id" || token.blockType === "id-ref";
  return Object.freeze({
    blockType: token.blockType,
    name: token.name,
    required: flags.data.required === "true",
    repeatable: flags.data.repeat === "many",
    ...(isIdBlock ? { idKind: token.name } : {}),
    coveredBy: Object.freeze(splitList(token.attributes.covered_by)),
    has: Object.freeze(splitList(token.attributes.has)),
    attributes: Object.freeze({ ...token.attributes }),
    line: node.startLine,
    endLine: node.endLine,
    children: Object.freeze(node.children.map(toTemplateBlock)),
  });
}

/** `.../{KIND}/template.md` → KIND */
function kindFromPath(path: string): string | undefined {
  if (basename(path) !== "template.md") return undefined;
  const dir = basename(dirname(path));
  return dir && dir !== "." ? dir.toUpperCase() : undefined;
}

function parseFrontmatter(raw: string | undefined) {
  if (raw === undefined) return templateFrontmatterSchema.parse({});
  let data: unknown;
  try {
    data = yamlParse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ParseError("INVALID_FRONTMATTER", `Invalid template frontmatter: ${message}`, 1);
  }
  const parsed = templateFrontmatterSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ParseError(
      "INVALID_FRONTMATTER",
      `Invalid template frontmatter at ${first.path.join(".") || "<root>"}: ${first.message}`,
      1,
    );
  }
  return parsed.data;
}

/** Parse template text. Throws ParseError; never returns a partial template. */
export function parseTemplateText(
  text: string,
  path: string,
  options: TemplateParseOptions,
): Template {
  try {
    const scan = scanMarkers(text, options.prefix);
    const meta = parseFrontmatter(scan.frontmatter).template;

    const version = meta?.version ?? SUPPORTED_TEMPLATE_VERSION;
    if (
      version.major > SUPPORTED_TEMPLATE_VERSION.major ||
      (version.major === SUPPORTED_TEMPLATE_VERSION.major &&
        version.minor > SUPPORTED_TEMPLATE_VERSION.minor)
    ) {
      throw new ParseError(
        "UNSUPPORTED_VERSION",
        `Template version ${version.major}.${version.minor} is newer than supported ${SUPPORTED_TEMPLATE_VERSION.major}.${SUPPORTED_TEMPLATE_VERSION.minor}`,
        1,
      );
    }

    const kind = meta?.kind ?? kindFromPath(path) ?? options.kind;
    if (!kind) {
      throw new ConfigurationError(
        "Cannot determine template kind (no frontmatter kind and path is not .../{KIND}/template.md)",
        path,
      );
    }

    const root: TemplateBlock = Object.freeze({
      blockType: "free",
      name: "document",
      required: true,
      repeatable: false,
      coveredBy: Object.freeze([]),
      has: Object.freeze([]),
      attributes: Object.freeze({}),
      line: 1,
      endLine: scan.lines.length,
      children: Object.freeze(scan.roots.map(toTemplateBlock)),
    });

    return Object.freeze({
      path,
      kind: kind.trim(),
      version,
      unknownSections: meta?.unknown_sections ?? "warn",
      ...(meta?.validation_level ? { validationLevel: meta.validation_level } : {}),
      root,
    });
  } catch (err) {
    if (err instanceof ParseError && err.path === undefined) err.path = path;
    throw err;
  }
}

/** Read and parse a template file. A missing file is a ConfigurationError. */
export async function parseTemplate(
  path: string,
  options: TemplateParseOptions,
): Promise<Template> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      throw new ConfigurationError(`Template not found: ${path}`, path);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to read template: ${message}`, path);
  }
  return parseTemplateText(text, path, options);
}

/** Depth-first list of every block in the template, document order. */
export function flattenTemplate(template: Template): TemplateBlock[] {
  const out: TemplateBlock[] = [];
  const visit = (block: TemplateBlock): void => {
    for (const child of block.children) {
      out.push(child);
      visit(child);
    }
  };
  visit(template.root);
  return out;
}
