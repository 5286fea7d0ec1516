import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { MalformedHeaderError, NotFoundError } from "../src/errors.js";
import { kindFromId } from "../src/model/SpecDocument.js";
import { extractRequirements, findRequirementIds, parseSpecDocument, readSpecDocument, splitHeader } from "../src/parser.js";
import { SAMPLE_SPEC, makeTempDir, removeTempDirs } from "./helpers.js";

afterEach(removeTempDirs);

describe("parseSpecDocument", () => {
  it("reads header fields, capabilities, purpose and requirements", () => {
    const document = parseSpecDocument(SAMPLE_SPEC);

    expect(document.specId).toBe("SPEC-001");
    expect(document.feature).toBe("User Login");
    expect(document.status).toBe("draft");
    expect(document.version).toBe("1.0.0");
    expect(document.author).toBe("Test Author");
    expect(document.date).toBe("2024-01-01");
    expect(document.relatedCapabilities).toEqual(["forms-validation", "clean-architecture"]);
    expect(document.purpose).toBe("Let registered users sign in");
    expect(document.requirements).toEqual([
      { id: "REQ-001-U-01", kind: "U", description: "The system shall validate credentials" },
      {
        id: "REQ-001-E-01",
        kind: "E",
        description: "WHEN [trigger event], the system shall show an error on failure",
      },
    ]);
  });

  it("applies defaults for optional header fields", () => {
    const document = parseSpecDocument("---\nspec_id: SPEC-002\nfeature: Cart\n---\n\n# Cart\n");

    expect(document.status).toBe("draft");
    expect(document.version).toBe("1.0.0");
    expect(document.author).toBe("Unknown");
    expect(document.date).toBe("");
    expect(document.relatedCapabilities).toEqual([]);
    expect(document.requirements).toEqual([]);
    expect(document.purpose).toBe("");
  });

  it("rejects a document without a header block", () => {
    expect(() => parseSpecDocument("# Just a heading\n")).toThrow(MalformedHeaderError);
  });

  it("names the missing required field", () => {
    try {
      parseSpecDocument("---\nspec_id: SPEC-003\n---\n");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedHeaderError);
      expect(error instanceof MalformedHeaderError ? error.field : undefined).toBe("feature");
    }
  });

  it("de-duplicates capabilities keeping first occurrence", () => {
    const text = "---\nspec_id: SPEC-004\nfeature: X\nrelated_capabilities:\n  - a\n  - b\n  - a\n---\n";
    expect(parseSpecDocument(text).relatedCapabilities).toEqual(["a", "b"]);
  });

  it("parses CRLF documents the same way", () => {
    const crlf = parseSpecDocument(SAMPLE_SPEC.replace(/\n/g, "\r\n"));
    expect(crlf).toEqual(parseSpecDocument(SAMPLE_SPEC));
  });
});

describe("extractRequirements", () => {
  it("keeps the first occurrence of an ID and groups by kind", () => {
    const body = [
      "- **REQ-1-E-01**: event one",
      "- **REQ-1-U-01**: core one",
      "- **REQ-1-U-01**: duplicate",
      "- **REQ-1-S-01**: state one",
    ].join("\n");

    expect(extractRequirements(body).map((requirement) => [requirement.id, requirement.description])).toEqual([
      ["REQ-1-U-01", "core one"],
      ["REQ-1-S-01", "state one"],
      ["REQ-1-E-01", "event one"],
    ]);
  });

  it("accepts lines with an empty description or no space after the colon", () => {
    const body = ["- **REQ-001-U-01**:", "- **REQ-001-U-02**:no space", "- **REQ-001-U-03**: ok"].join("\n");

    expect(extractRequirements(body)).toEqual([
      { id: "REQ-001-U-01", kind: "U", description: "" },
      { id: "REQ-001-U-02", kind: "U", description: "no space" },
      { id: "REQ-001-U-03", kind: "U", description: "ok" },
    ]);
    expect(findRequirementIds(body)).toEqual(["REQ-001-U-01", "REQ-001-U-02", "REQ-001-U-03"]);
  });

  it("treats IDs without a kind token as ubiquitous", () => {
    expect(kindFromId("REQ-7-X-1")).toBe("U");
    expect(kindFromId("REQ-7-N-1")).toBe("N");
  });
});

describe("splitHeader", () => {
  it("returns null for an unterminated header", () => {
    expect(splitHeader("---\nspec_id: SPEC-1\n")).toBeNull();
  });
});

describe("readSpecDocument", () => {
  it("throws NotFoundError for a missing file", async () => {
    const dir = await makeTempDir();
    await expect(readSpecDocument(path.join(dir, "SPEC.md"))).rejects.toBeInstanceOf(NotFoundError);
  });
});
