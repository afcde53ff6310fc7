import { describe, it, expect, afterEach } from "vitest";
import {
  listIdsCommand,
  listKindsCommand,
  runCommand,
  validateCommand,
  whereDefinedCommand,
  whereUsedCommand,
} from "../../src/commands.js";
import { PAYMENTS_FIXTURE, cleanupProjects, copyPayments, replaceLine } from "../helpers/project.js";

afterEach(async () => {
  await cleanupProjects();
});

describe("validate", () => {
  it("exits 1 when any artifact fails", async () => {
    const { stdout, exitCode } = await runCommand(() => validateCommand({ root: PAYMENTS_FIXTURE }));
    expect(exitCode).toBe(1);
    const report = JSON.parse(stdout);
    expect(report.status).toBe("FAIL");
    expect(report.artifacts).toHaveLength(2);
  });

  it("exits 0 for a passing artifact", async () => {
    const { stdout, exitCode } = await runCommand(() =>
      validateCommand({ root: PAYMENTS_FIXTURE, artifact: "docs/DESIGN.md" }),
    );
    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout)).toMatchObject({ artifactPath: "docs/DESIGN.md", status: "PASS", score: 100 });
  });

  it("renders markdown on request", async () => {
    const { stdout } = await runCommand(() =>
      validateCommand({ root: PAYMENTS_FIXTURE, artifact: "docs/DESIGN.md", format: "markdown" }),
    );
    expect(stdout.split("\n").slice(0, 2)).toEqual(["## Validation Report", "**Status:** PASSED"]);
  });

  it("turns configuration errors into a structured payload", async () => {
    const { stdout, exitCode } = await runCommand(() =>
      validateCommand({ root: PAYMENTS_FIXTURE, artifact: "docs/NOPE.md" }),
    );
    expect(exitCode).toBe(1);
    expect(JSON.parse(stdout)).toEqual({
      status: "ERROR",
      error: {
        type: "ConfigurationError",
        path: "docs/NOPE.md",
        message: "Artifact is not registered in .tracemark.json: docs/NOPE.md",
      },
    });
  });

  it("turns parse errors into a structured payload", async () => {
    const dir = await copyPayments();
    await replaceLine(dir, "docs/PRD.md", "# Payments PRD", "<!-- spd:paragraph:broken -->");

    const { stdout, exitCode } = await runCommand(() => validateCommand({ root: dir, artifact: "docs/PRD.md" }));
    expect(exitCode).toBe(1);
    expect(JSON.parse(stdout)).toEqual({
      status: "ERROR",
      error: {
        type: "ParseError",
        reason: "UNBALANCED_MARKERS",
        path: "docs/PRD.md",
        line: 3,
        message:
          "Marker #:title closes the span opened at line 1 while paragraph:broken (line 2) is still open",
      },
    });
  });
});

describe("queries", () => {
  it("list-ids prints definitions", async () => {
    const { stdout, exitCode } = await listIdsCommand({ root: PAYMENTS_FIXTURE, pattern: "admin" });
    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout).map((d: { id: string }) => d.id)).toEqual(["spd-pay-actor-admin"]);
  });

  it("list-ids fails when --artifact does not parse", async () => {
    const dir = await copyPayments();
    await replaceLine(dir, "docs/PRD.md", "# Payments PRD", "<!-- spd:paragraph:broken -->");

    const { stdout, exitCode } = await runCommand(() => listIdsCommand({ root: dir, artifact: "docs/PRD.md" }));
    expect(exitCode).toBe(1);
    expect(JSON.parse(stdout).error).toMatchObject({
      type: "ParseError",
      reason: "UNBALANCED_MARKERS",
      path: "docs/PRD.md",
      line: 3,
    });
  });

  it("list-ids and list-kinds fail when --artifact is not registered", async () => {
    const expected = {
      status: "ERROR",
      error: {
        type: "ConfigurationError",
        path: "docs/NOPE.md",
        message: "Artifact is not registered in .tracemark.json: docs/NOPE.md",
      },
    };

    const ids = await runCommand(() => listIdsCommand({ root: PAYMENTS_FIXTURE, artifact: "docs/NOPE.md" }));
    expect(ids.exitCode).toBe(1);
    expect(JSON.parse(ids.stdout)).toEqual(expected);

    const kinds = await runCommand(() => listKindsCommand({ root: PAYMENTS_FIXTURE, artifact: "docs/NOPE.md" }));
    expect(kinds.exitCode).toBe(1);
    expect(JSON.parse(kinds.stdout)).toEqual(expected);
  });

  it("where-defined prints null for unknown IDs", async () => {
    const { stdout } = await whereDefinedCommand({ root: PAYMENTS_FIXTURE, id: "spd-pay-actor-owner" });
    expect(stdout).toBe("null");
  });

  it("where-used prints references, with definitions on request", async () => {
    const plain = await whereUsedCommand({ root: PAYMENTS_FIXTURE, id: "spd-pay-actor-admin" });
    expect(JSON.parse(plain.stdout)).toHaveLength(1);

    const full = await whereUsedCommand({
      root: PAYMENTS_FIXTURE,
      id: "spd-pay-actor-admin",
      includeDefinitions: true,
    });
    const parsed = JSON.parse(full.stdout);
    expect(Object.keys(parsed)).toEqual(["id", "definitions", "references"]);
    expect(parsed.definitions[0].line).toBe(8);
    expect(parsed.references[0].artifactPath).toBe("docs/DESIGN.md");
  });

  it("list-kinds prints kind summaries", async () => {
    const { stdout } = await listKindsCommand({ root: PAYMENTS_FIXTURE });
    expect(JSON.parse(stdout)).toEqual([{ kind: "actor", artifactKinds: ["PRD"], definitions: 2 }]);
  });
});
