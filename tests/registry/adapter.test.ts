import { describe, it, expect, afterEach } from "vitest";
import { join } from "node:path";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { tracemarkConfigSchema, type TracemarkConfigInput } from "../../src/config/schema.js";
import { ConfigurationError } from "../../src/errors.js";
import { createRegistry } from "../../src/registry/adapter.js";

const dirs: string[] = [];

async function createProject(files: string[]): Promise<string> {
  const dir = join(tmpdir(), `tracemark-test-${randomUUID()}`);
  dirs.push(dir);
  for (const file of files) {
    const full = join(dir, file);
    await mkdir(join(full, ".."), { recursive: true });
    await writeFile(full, "# placeholder\n");
  }
  return dir;
}

function registryFor(dir: string, input: TracemarkConfigInput) {
  return createRegistry(tracemarkConfigSchema.parse(input), dir);
}

afterEach(async () => {
  for (const d of dirs) await rm(d, { recursive: true, force: true });
  dirs.length = 0;
});

describe("createRegistry", () => {
  describe("resolve", () => {
    const input: TracemarkConfigInput = {
      templates: { ADR: "tpl/adr.md" },
      artifacts: [
        { path: "docs/PRD.md", kind: "PRD", template: "custom/prd.md", validationLevel: "STRICT" },
        { path: "docs/adr", kind: "ADR" },
        { path: "docs/design", kind: "DESIGN" },
      ],
    };

    it("uses the entry's own template first", async () => {
      const dir = await createProject([]);
      expect(registryFor(dir, input).resolve("docs/PRD.md")).toEqual({
        artifactPath: join(dir, "docs", "PRD.md"),
        relativePath: "docs/PRD.md",
        templatePath: join(dir, "custom", "prd.md"),
        kind: "PRD",
        strict: true,
      });
    });

    it("falls back to the per-kind template, then the conventional location", async () => {
      const dir = await createProject([]);
      const registry = registryFor(dir, input);

      const adr = registry.resolve("docs/adr/0001-x.md");
      expect(adr?.templatePath).toBe(join(dir, "tpl", "adr.md"));
      expect(adr?.strict).toBe(false);

      const design = registry.resolve(join(dir, "docs", "design", "api.md"));
      expect(design?.relativePath).toBe("docs/design/api.md");
      expect(design?.templatePath).toBe(join(dir, "templates", "DESIGN", "template.md"));
    });

    it("returns null for paths no entry covers", async () => {
      const dir = await createProject([]);
      const registry = registryFor(dir, input);
      expect(registry.resolve("docs/adr/notes.txt")).toBeNull();
      expect(registry.resolve("README.md")).toBeNull();
    });
  });

  describe("entries", () => {
    it("expands directories into sorted Markdown files", async () => {
      const dir = await createProject([
        "docs/PRD.md",
        "docs/adr/0002-b.md",
        "docs/adr/0001-a.md",
        "docs/adr/sub/0003-c.md",
        "docs/adr/readme.txt",
        "docs/adr/.drafts/0004-d.md",
      ]);
      const registry = registryFor(dir, {
        artifacts: [
          { path: "docs/PRD.md", kind: "PRD" },
          { path: "docs/adr", kind: "ADR" },
          { path: "docs/adr/0001-a.md", kind: "ADR" },
        ],
      });

      const entries = await registry.entries();
      expect(entries.map((e) => [e.relativePath, e.kind])).toEqual([
        ["docs/PRD.md", "PRD"],
        ["docs/adr/0001-a.md", "ADR"],
        ["docs/adr/0002-b.md", "ADR"],
        ["docs/adr/sub/0003-c.md", "ADR"],
      ]);
    });

    it("fails on a registered path that does not exist", async () => {
      const dir = await createProject([]);
      const registry = registryFor(dir, { artifacts: [{ path: "docs/design", kind: "DESIGN" }] });
      await expect(registry.entries()).rejects.toBeInstanceOf(ConfigurationError);
      await expect(registry.entries()).rejects.toThrow("Registered artifact path not found: docs/design");
    });
  });
});
