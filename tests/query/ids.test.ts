import { describe, it, expect, afterEach } from "vitest";
import { listIds, listKinds, whereDefined, whereUsed } from "../../src/query/ids.js";
import type { IdDefinition } from "../../src/types.js";
import { createContext } from "../../src/validation/pipeline.js";
import { PAYMENTS_FIXTURE, cleanupProjects, copyPayments, replaceLine } from "../helpers/project.js";

const admin: IdDefinition = {
  id: "spd-pay-actor-admin",
  artifactPath: "docs/PRD.md",
  artifactKind: "PRD",
  line: 8,
  checked: true,
  hasCheckbox: true,
  idKind: "actor",
  coveredBy: ["DESIGN"],
};

const guest: IdDefinition = { ...admin, id: "spd-pay-actor-guest", line: 11, checked: false };

afterEach(async () => {
  await cleanupProjects();
});

describe("listIds", () => {
  it("lists definitions in registry and document order", async () => {
    const ctx = await createContext(PAYMENTS_FIXTURE);
    expect(await listIds(ctx)).toEqual([admin, guest]);
  });

  it("filters by substring, regex, kind and artifact", async () => {
    const ctx = await createContext(PAYMENTS_FIXTURE);
    expect((await listIds(ctx, { pattern: "guest" })).map((d) => d.id)).toEqual(["spd-pay-actor-guest"]);
    expect((await listIds(ctx, { pattern: "admin$", regex: true })).map((d) => d.id)).toEqual([
      "spd-pay-actor-admin",
    ]);
    expect(await listIds(ctx, { kind: "fr" })).toEqual([]);
    expect(await listIds(ctx, { artifact: "docs/DESIGN.md" })).toEqual([]);
    expect(await listIds(ctx, { artifact: "docs/PRD.md", kind: "actor" })).toHaveLength(2);
  });

  it("rejects an invalid regular expression", async () => {
    const ctx = await createContext(PAYMENTS_FIXTURE);
    await expect(listIds(ctx, { pattern: "(", regex: true })).rejects.toThrow(
      /^Invalid --pattern regular expression: /,
    );
  });

  it("keeps duplicates only with all", async () => {
    const dir = await copyPayments();
    await replaceLine(dir, "docs/PRD.md", "- [ ] **ID**: `spd-pay-actor-guest`", "- [x] **ID**: `spd-pay-actor-admin`");
    const ctx = await createContext(dir);

    expect((await listIds(ctx)).map((d) => d.line)).toEqual([8]);
    expect((await listIds(ctx, { all: true })).map((d) => d.line)).toEqual([8, 11]);
  });
});

describe("whereDefined", () => {
  it("finds the definition of an exact ID", async () => {
    const ctx = await createContext(PAYMENTS_FIXTURE);
    expect(await whereDefined(ctx, "spd-pay-actor-guest")).toEqual(guest);
    expect(await whereDefined(ctx, "spd-pay-actor-owner")).toBeNull();
  });
});

describe("whereUsed", () => {
  it("matches references regardless of version suffix", async () => {
    const ctx = await createContext(PAYMENTS_FIXTURE);
    expect(await whereUsed(ctx, "spd-pay-actor-admin-v2")).toEqual({
      references: [
        {
          id: "spd-pay-actor-admin",
          artifactPath: "docs/DESIGN.md",
          artifactKind: "DESIGN",
          line: 6,
          checked: true,
          hasCheckbox: true,
          source: "id-ref",
        },
      ],
      definitions: [admin],
    });
  });

  it("returns nothing for an unused ID", async () => {
    const ctx = await createContext(PAYMENTS_FIXTURE);
    expect((await whereUsed(ctx, "spd-pay-actor-guest")).references).toEqual([]);
  });
});

describe("listKinds", () => {
  it("counts definitions per ID kind declared by templates", async () => {
    const ctx = await createContext(PAYMENTS_FIXTURE);
    expect(await listKinds(ctx)).toEqual([{ kind: "actor", artifactKinds: ["PRD"], definitions: 2 }]);
    expect(await listKinds(ctx, "docs/DESIGN.md")).toEqual([]);
  });
});
