import { readdir, stat } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import { ConfigurationError, isNotFound } from "../errors.js";
import type { ArtifactEntryConfig, TracemarkConfig } from "../types.js";

/** An artifact file together with the template and level it is validated against. */
export interface RegisteredArtifact {
  /** Absolute path. */
  artifactPath: string;
  /** Project-relative, `/`-separated. */
  relativePath: string;
  /** Absolute template path. */
  templatePath: string;
  kind: string;
  strict: boolean;
}

export interface Registry {
  /** Registration covering a path, or null when no entry covers it. */
  resolve(artifactPath: string): RegisteredArtifact | null;
  /** Every registered artifact file, directories expanded, in config then path order. */
  entries(): Promise<RegisteredArtifact[]>;
}

export function toProjectPath(projectDir: string, absolutePath: string): string {
  return relative(projectDir, absolutePath).split(sep).join("/");
}

async function walkMarkdown(dir: string): Promise<string[]> {
  const dirents = await readdir(dir, { withFileTypes: true });
  const names = dirents
    .filter((d) => !d.name.startsWith("."))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const dirent of names) {
    const full = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      files.push(...(await walkMarkdown(full)));
    } else if (dirent.isFile() && dirent.name.endsWith(".md")) {
      files.push(full);
    }
  }
  return files;
}

export function createRegistry(config: TracemarkConfig, projectDir: string): Registry {
  const root = resolve(projectDir);

  const templateFor = (entry: ArtifactEntryConfig): string =>
    resolve(
      root,
      entry.template ?? config.templates[entry.kind] ?? join(config.templatesDir, entry.kind, "template.md"),
    );

  const describe = (entry: ArtifactEntryConfig, artifactPath: string): RegisteredArtifact => ({
    artifactPath,
    relativePath: toProjectPath(root, artifactPath),
    templatePath: templateFor(entry),
    kind: entry.kind,
    strict: entry.validationLevel === "STRICT",
  });

  return {
    resolve(artifactPath) {
      const target = resolve(root, artifactPath);
      for (const entry of config.artifacts) {
        const base = resolve(root, entry.path);
        if (target === base || (target.startsWith(base + sep) && target.endsWith(".md"))) {
          return describe(entry, target);
        }
      }
      return null;
    },

    async entries() {
      const seen = new Set<string>();
      const out: RegisteredArtifact[] = [];
      for (const entry of config.artifacts) {
        const base = resolve(root, entry.path);
        let files: string[];
        try {
          const info = await stat(base);
          files = info.isDirectory() ? await walkMarkdown(base) : [base];
        } catch (err) {
          if (isNotFound(err)) {
            throw new ConfigurationError(`Registered artifact path not found: ${entry.path}`, entry.path);
          }
          throw err;
        }
        for (const file of files) {
          if (seen.has(file)) continue;
          seen.add(file);
          out.push(describe(entry, file));
        }
      }
      return out;
    },
  };
}
