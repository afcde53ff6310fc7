import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { ConfigurationError, isNotFound } from "../errors.js";
import type { TracemarkConfig } from "../types.js";
import { tracemarkConfigSchema } from "./schema.js";

export const CONFIG_FILENAME = ".tracemark.json";

/**
 * Load `.tracemark.json` from the project root (or an explicit path).
 * A missing file yields the defaults; anything unreadable or invalid is a
 * ConfigurationError.
 */
export async function loadConfig(
  projectDir: string = process.cwd(),
  configPath?: string,
): Promise<TracemarkConfig> {
  const path = configPath
    ? isAbsolute(configPath)
      ? configPath
      : resolve(projectDir, configPath)
    : join(projectDir, CONFIG_FILENAME);

  let raw: unknown = {};
  try {
    const content = await readFile(path, "utf-8");
    raw = JSON.parse(content);
  } catch (err: unknown) {
    if (isNotFound(err) && !configPath) {
      // No config file: defaults
    } else if (isNotFound(err)) {
      throw new ConfigurationError(`Config file not found: ${path}`, path);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Failed to read config: ${message}`, path);
    }
  }

  const parsed = tracemarkConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${CONFIG_FILENAME}: ${details}`, path);
  }
  return parsed.data;
}
