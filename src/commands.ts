import { resolve } from "node:path";
import { toErrorPayload } from "./errors.js";
import { listIds, listKinds, whereDefined, whereUsed } from "./query/ids.js";
import { formatHumanReport } from "./reporter/human.js";
import { formatJsonReport } from "./reporter/json.js";
import { createContext, validateAll, validateArtifact } from "./validation/pipeline.js";

/** What a command prints on stdout and the process exit code it asks for. */
export interface CommandResult {
  stdout: string;
  exitCode: number;
}

export interface GlobalOptions {
  root?: string;
  config?: string;
}

export type ReportFormat = "json" | "markdown";

export interface ValidateOptions extends GlobalOptions {
  artifact?: string;
  format?: ReportFormat;
}

export interface ListIdsOptions extends GlobalOptions {
  artifact?: string;
  pattern?: string;
  regex?: boolean;
  kind?: string;
  all?: boolean;
}

export interface IdOptions extends GlobalOptions {
  id: string;
}

export interface WhereUsedOptions extends IdOptions {
  includeDefinitions?: boolean;
}

export interface ListKindsOptions extends GlobalOptions {
  artifact?: string;
}

function json(value: unknown, exitCode = 0): CommandResult {
  return { stdout: JSON.stringify(value, null, 2), exitCode };
}

function contextFor(opts: GlobalOptions) {
  return createContext(resolve(opts.root ?? process.cwd()), opts.config);
}

/** Run a command, turning any thrown error into the structured error payload. */
export async function runCommand(action: () => Promise<CommandResult>): Promise<CommandResult> {
  try {
    return await action();
  } catch (err) {
    return json({ status: "ERROR", error: toErrorPayload(err) }, 1);
  }
}

export async function validateCommand(opts: ValidateOptions): Promise<CommandResult> {
  const ctx = await contextFor(opts);
  const result = opts.artifact !== undefined ? await validateArtifact(ctx, opts.artifact) : await validateAll(ctx);
  const stdout = opts.format === "markdown" ? formatHumanReport(result) : formatJsonReport(result);
  return { stdout, exitCode: result.status === "PASS" ? 0 : 1 };
}

export async function listIdsCommand(opts: ListIdsOptions): Promise<CommandResult> {
  const ctx = await contextFor(opts);
  return json(
    await listIds(ctx, {
      ...(opts.artifact !== undefined ? { artifact: opts.artifact } : {}),
      ...(opts.pattern !== undefined ? { pattern: opts.pattern } : {}),
      regex: opts.regex === true,
      ...(opts.kind !== undefined ? { kind: opts.kind } : {}),
      all: opts.all === true,
    }),
  );
}

export async function whereDefinedCommand(opts: IdOptions): Promise<CommandResult> {
  const ctx = await contextFor(opts);
  return json(await whereDefined(ctx, opts.id));
}

export async function whereUsedCommand(opts: WhereUsedOptions): Promise<CommandResult> {
  const ctx = await contextFor(opts);
  const { references, definitions } = await whereUsed(ctx, opts.id);
  if (opts.includeDefinitions) {
    return json({ id: opts.id, definitions, references });
  }
  return json(references);
}

export async function listKindsCommand(opts: ListKindsOptions): Promise<CommandResult> {
  const ctx = await contextFor(opts);
  return json(await listKinds(ctx, opts.artifact));
}
