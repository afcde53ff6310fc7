/** Prefix and registered systems that shape `{prefix}-{project}-{kind}-{slug}` IDs. */
export interface IdFormatOptions {
  prefix: string;
  /** Registered project/system slugs. Empty: the project is the single segment after the prefix. */
  systems: readonly string[];
}

/** Decomposed ID. */
export interface ParsedId {
  system: string;
  /** First kind segment after the system. */
  kind: string;
  /** Everything after the first kind segment. */
  slug: string;
  /** Trailing `-vN`, when present. */
  version?: number;
}

const SEGMENTS_RE = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
const VERSION_RE = /-v(\d+)$/;

/** Strip a trailing `-vN`: every version of an ID shares one base. */
export function baseId(id: string): string {
  return id.replace(VERSION_RE, "");
}

/** System segment of an ID, or null when it does not start with the prefix or a registered system. */
export function systemOf(id: string, options: IdFormatOptions): string | null {
  const head = `${options.prefix}-`;
  if (!id.startsWith(head)) return null;
  const rest = id.slice(head.length);
  if (options.systems.length === 0) {
    const first = rest.split("-")[0];
    return first ? first : null;
  }
  // longest match wins so that `account-server` beats `account`
  let best: string | null = null;
  for (const system of options.systems) {
    if (rest.startsWith(`${system}-`) && (best === null || system.length > best.length)) {
      best = system;
    }
  }
  return best;
}

export function parseId(id: string, options: IdFormatOptions): ParsedId | null {
  if (!SEGMENTS_RE.test(id)) return null;
  const system = systemOf(id, options);
  if (system === null) return null;
  const remainder = id.slice(options.prefix.length + 1 + system.length + 1);
  const segments = remainder.split("-").filter((s) => s.length > 0);
  if (segments.length < 2) return null;
  const version = VERSION_RE.exec(id);
  return {
    system,
    kind: segments[0],
    slug: segments.slice(1).join("-"),
    ...(version ? { version: Number(version[1]) } : {}),
  };
}

/**
 * Check an ID against `{prefix}-{project}-{kind}-{slug}(-vN)?`.
 * Returns a description of the problem, or null when the ID is well formed.
 *
 * With `expectedKind`, the kind must be the first kind segment or appear later
 * as a composite separator (`spd-app-spec-auth-algo-hash` is an `algo`).
 */
export function checkIdFormat(
  id: string,
  options: IdFormatOptions,
  expectedKind?: string,
): string | null {
  if (!SEGMENTS_RE.test(id)) {
    return `ID "${id}" must be lowercase alphanumeric segments joined by "-"`;
  }
  if (!id.startsWith(`${options.prefix}-`)) {
    return `ID "${id}" must start with "${options.prefix}-"`;
  }
  const system = systemOf(id, options);
  if (system === null && !options.systems.includes(id.slice(options.prefix.length + 1))) {
    return `ID "${id}" does not start with a registered system (${options.systems.join(", ")})`;
  }
  const parsed = parseId(id, options);
  if (!parsed) {
    return `ID "${id}" is missing its kind or slug segment (expected ${options.prefix}-{project}-{kind}-{slug})`;
  }
  if (expectedKind !== undefined && parsed.kind !== expectedKind) {
    const segments = [parsed.kind, ...parsed.slug.split("-")];
    const at = segments.indexOf(expectedKind, 1);
    if (at === -1 || at === segments.length - 1) {
      return `ID "${id}" does not carry kind "${expectedKind}"`;
    }
  }
  return null;
}

/** Looser check for references: shape only, the system may be external. */
export function checkReferenceFormat(id: string, options: IdFormatOptions): string | null {
  if (!SEGMENTS_RE.test(id)) {
    return `Reference "${id}" must be lowercase alphanumeric segments joined by "-"`;
  }
  if (!id.startsWith(`${options.prefix}-`)) {
    return `Reference "${id}" must start with "${options.prefix}-"`;
  }
  if (id.slice(options.prefix.length + 1).split("-").length < 3) {
    return `Reference "${id}" is missing its kind or slug segment (expected ${options.prefix}-{project}-{kind}-{slug})`;
  }
  return null;
}

export function isValidIdFormat(id: string, options: IdFormatOptions, expectedKind?: string): boolean {
  return checkIdFormat(id, options, expectedKind) === null;
}
