import { describe, it, expect } from "vitest";
import { ParseError } from "../../src/errors.js";
import { parseAttributes, scanMarkers, splitLines } from "../../src/markers/scanner.js";

function doc(...lines: string[]): string {
  return lines.join("\n") + "\n";
}

function scanError(text: string): ParseError {
  try {
    scanMarkers(text, "spd");
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error("expected scanMarkers to throw");
}

describe("splitLines", () => {
  it("accepts CRLF and drops the trailing empty line", () => {
    expect(splitLines("a\r\nb\r\n")).toEqual(["a", "b"]);
    expect(splitLines("a\nb")).toEqual(["a", "b"]);
  });
});

describe("parseAttributes", () => {
  it("reads quoted key/value pairs in order", () => {
    expect(parseAttributes(' required="false" repeat="many"', 4)).toEqual({
      required: "false",
      repeat: "many",
    });
  });

  it("rejects unquoted values", () => {
    expect(() => parseAttributes(" required=true", 4)).toThrow(
      'Malformed marker attribute near "required=true"',
    );
  });
});

describe("scanMarkers", () => {
  it("nests spans and separates own lines from child lines", () => {
    const result = scanMarkers(
      doc(
        "<!-- spd:##:actors -->",
        "## Actors",
        "<!-- spd:id:actor -->",
        "- **ID**: `spd-app-actor-a`",
        "<!-- spd:id:actor -->",
        "trailing",
        "<!-- spd:##:actors -->",
      ),
      "spd",
    );

    expect(result.roots).toHaveLength(1);
    const [root] = result.roots;
    expect(root.token.blockType).toBe("##");
    expect(root.token.name).toBe("actors");
    expect(root.startLine).toBe(1);
    expect(root.endLine).toBe(7);
    expect(root.contentLines).toEqual([
      "## Actors",
      "<!-- spd:id:actor -->",
      "- **ID**: `spd-app-actor-a`",
      "<!-- spd:id:actor -->",
      "trailing",
    ]);
    expect(root.ownLines.map((l) => l.line)).toEqual([2, 6]);
    expect(root.ownLines.map((l) => l.text)).toEqual(["## Actors", "trailing"]);

    expect(root.children).toHaveLength(1);
    const [child] = root.children;
    expect(child.startLine).toBe(3);
    expect(child.endLine).toBe(5);
    expect(child.contentLines).toEqual(["- **ID**: `spd-app-actor-a`"]);
  });

  it("parses attributes on opening markers", () => {
    const result = scanMarkers(
      doc(
        '<!-- spd:id:actor required="false" repeat="many" covered_by="DESIGN,SPEC" -->',
        "x",
        "<!-- spd:id:actor -->",
      ),
      "spd",
    );
    expect(result.roots[0].token.attributes).toEqual({
      required: "false",
      repeat: "many",
      covered_by: "DESIGN,SPEC",
    });
  });

  it("treats a one-part marker as a free block and supports self-closing markers", () => {
    const result = scanMarkers(
      doc("<!-- spd:intro -->", "<!-- spd:paragraph:note /-->", "<!-- spd:intro -->"),
      "spd",
    );
    const [intro] = result.roots;
    expect(intro.token.blockType).toBe("free");
    expect(intro.token.name).toBe("intro");
    expect(intro.children).toHaveLength(1);
    const [note] = intro.children;
    expect(note.token.selfClosing).toBe(true);
    expect(note.startLine).toBe(2);
    expect(note.endLine).toBe(2);
    expect(note.contentLines).toEqual([]);
  });

  it("ignores markers inside code fences and other prefixes", () => {
    const result = scanMarkers(
      doc("```md", "<!-- spd:paragraph:x -->", "```", "<!-- cpt:paragraph:y -->"),
      "spd",
    );
    expect(result.roots).toEqual([]);
    expect(result.lines).toHaveLength(4);
  });

  it("skips YAML frontmatter", () => {
    const result = scanMarkers(doc("---", "title: <!-- spd:paragraph:x -->", "---", "body"), "spd");
    expect(result.roots).toEqual([]);
    expect(result.frontmatter).toBe("title: <!-- spd:paragraph:x -->");
    expect(result.frontmatterLine).toBe(1);
  });

  it("reads CRLF documents", () => {
    const result = scanMarkers(
      "<!-- spd:paragraph:p -->\r\nHello\r\n<!-- spd:paragraph:p -->\r\n",
      "spd",
    );
    expect(result.roots[0].contentLines).toEqual(["Hello"]);
    expect(result.roots[0].endLine).toBe(3);
  });

  describe("errors", () => {
    it("reports an unclosed marker at its opening line", () => {
      const err = scanError(doc("intro", "<!-- spd:paragraph:a -->", "text"));
      expect(err.reason).toBe("UNBALANCED_MARKERS");
      expect(err.line).toBe(2);
      expect(err.message).toBe("Marker paragraph:a is never closed");
    });

    it("reports crossed markers where the crossing happens", () => {
      const err = scanError(
        doc(
          "<!-- spd:##:a -->",
          "<!-- spd:paragraph:b -->",
          "<!-- spd:##:a -->",
          "<!-- spd:paragraph:b -->",
        ),
      );
      expect(err.reason).toBe("UNBALANCED_MARKERS");
      expect(err.line).toBe(3);
    });

    it("rejects a block opened and closed on one line", () => {
      const err = scanError(
        doc("<!-- spd:##:roles -->", "<!-- spd:paragraph:role -->Text<!-- spd:paragraph:role -->", "<!-- spd:##:roles -->"),
      );
      expect(err.reason).toBe("UNBALANCED_MARKERS");
      expect(err.line).toBe(2);
      expect(err.message).toBe(
        "Marker paragraph:role opens and closes on line 2; put its content on the lines between the markers, or use a self-closing marker",
      );
    });

    it("rejects unknown block types", () => {
      const err = scanError(doc("<!-- spd:widget:x -->", "<!-- spd:widget:x -->"));
      expect(err.reason).toBe("UNKNOWN_BLOCK_TYPE");
      expect(err.line).toBe(1);
      expect(err.message).toBe('Unknown block type "widget"');
    });

    it("rejects markers with too many segments", () => {
      const err = scanError(doc("<!-- spd:id:actor:extra -->"));
      expect(err.reason).toBe("MALFORMED_ATTRIBUTE");
    });

    it("rejects unterminated frontmatter", () => {
      const err = scanError(doc("---", "a: 1"));
      expect(err.reason).toBe("INVALID_FRONTMATTER");
      expect(err.line).toBe(1);
    });
  });
});
