import { describe, it, expect } from "vitest";
import { parseArtifactText } from "../../src/artifact/parser.js";
import { parseTemplateText } from "../../src/template/parser.js";
import { validateBlockContent } from "../../src/validation/content.js";

function check(type: string, lines: string[], attrs = ""): string[] {
  const template = parseTemplateText(`<!-- spd:${type}:x${attrs} -->\n<!-- spd:${type}:x -->\n`, "t.md", {
    prefix: "spd",
    kind: "T",
  });
  const artifact = parseArtifactText([`<!-- spd:${type}:x -->`, ...lines, `<!-- spd:${type}:x -->`].join("\n"), "a.md", {
    prefix: "spd",
  });
  return validateBlockContent(template.root.children[0], artifact.blocks[0]).map((i) => i.message);
}

describe("validateBlockContent", () => {
  it("reports at the block's opening line with a stable rule", () => {
    const template = parseTemplateText("<!-- spd:paragraph:x -->\n<!-- spd:paragraph:x -->\n", "t.md", {
      prefix: "spd",
      kind: "T",
    });
    const artifact = parseArtifactText("intro\n<!-- spd:paragraph:x -->\n\n<!-- spd:paragraph:x -->\n", "a.md", {
      prefix: "spd",
    });
    expect(validateBlockContent(template.root.children[0], artifact.blocks[0])).toEqual([
      {
        severity: "ERROR",
        line: 2,
        message: "paragraph:x: paragraph is empty",
        ruleId: "INVALID_BLOCK_CONTENT",
        category: "structural",
      },
    ]);
  });

  it("checks headings", () => {
    expect(check("##", ["## Overview"])).toEqual([]);
    expect(check("##", ["### Overview"])).toEqual(["##:x: expected a level 2 heading"]);
    expect(check("##", [])).toEqual(["##:x: heading is empty"]);
  });

  it("checks paragraphs", () => {
    expect(check("paragraph", ["Text"])).toEqual([]);
    expect(check("paragraph", [""])).toEqual(["paragraph:x: paragraph is empty"]);
  });

  it("checks list styles", () => {
    expect(check("list", ["- a", "  continued", "- b"])).toEqual([]);
    expect(check("list", ["1. a"])).toEqual(["list:x: expected a bullet list"]);
    expect(check("numbered-list", ["1. a", "2) b"])).toEqual([]);
    expect(check("numbered-list", ["- a"])).toEqual(["numbered-list:x: expected a numbered list"]);
  });

  it("checks task lists and their priorities", () => {
    expect(check("task-list", ["- [ ] a", "- [x] b"])).toEqual([]);
    expect(check("task-list", ["- a"])).toEqual(["task-list:x: expected a task list (- [ ] item)"]);
    expect(check("task-list", ["- [ ] a"], ' has="priority"')).toEqual(["task-list:x: task item missing priority"]);
    expect(check("task-list", ["- [ ] `p1` - a"], ' has="priority"')).toEqual([]);
  });

  it("checks tables", () => {
    expect(check("table", ["| A | B |", "|---|:-:|", "| 1 | 2 |"])).toEqual([]);
    expect(check("table", ["| A | B |", "|---|---|"])).toEqual(["table:x: table must have at least one data row"]);
    expect(check("table", ["| A | B |", "|---|", "| 1 | 2 |"])).toEqual([
      "table:x: table separator does not match the header columns",
    ]);
    expect(check("table", ["| A | B |", "|---|---|", "| 1 |"])).toEqual(["table:x: table row column count mismatch"]);
  });

  it("checks code fences", () => {
    expect(check("code", ["```ts", "const a = 1;", "```"])).toEqual([]);
    expect(check("code", ["const a = 1;"])).toEqual(["code:x: code block must start with ```"]);
  });

  it("checks links and images", () => {
    expect(check("link", ["[Docs](https://example.com/docs)"])).toEqual([]);
    expect(check("link", ["Docs"])).toEqual(["link:x: expected a Markdown link"]);
    expect(check("image", ["![Logo](logo.png)"])).toEqual([]);
    expect(check("image", ["Logo"])).toEqual(["image:x: expected a Markdown image"]);
  });
});
