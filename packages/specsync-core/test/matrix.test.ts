import { describe, expect, it } from "vitest";

import { MissingAnchorError } from "../src/errors.js";
import type { CodeReference } from "../src/model/SpecDocument.js";
import { parseSpecDocument } from "../src/parser.js";
import { computeTraceability } from "../src/traceability.js";
import { buildMatrixRows, patchTraceabilityMatrix, readMatrixRows } from "../src/writers/matrix.js";
import { SAMPLE_SPEC, ref, scanOf } from "./helpers.js";

const PENDING_ROWS = "| REQ-001-U-01 | [TBD] | [TBD] | ⏳ Pending |\n| REQ-001-E-01 | [TBD] | [TBD] | ⏳ Pending |";

function reportFor(references: CodeReference[]) {
  return computeTraceability(parseSpecDocument(SAMPLE_SPEC), scanOf(references));
}

describe("patchTraceabilityMatrix", () => {
  const report = reportFor([ref("REQ-001-U-01", "src/Login.kt"), ref("REQ-001-U-01", "test/LoginTest.kt", true)]);

  it("replaces the rows with one sorted row per requirement", () => {
    const result = patchTraceabilityMatrix(SAMPLE_SPEC, report);

    expect(result.applied).toBe(true);
    expect(result.content).toBe(
      SAMPLE_SPEC.replace(
        PENDING_ROWS,
        "| REQ-001-E-01 | — | — | ⏳ Pending |\n| REQ-001-U-01 | src/Login.kt | test/LoginTest.kt | ✅ Tested |"
      )
    );
  });

  it("is idempotent", () => {
    const once = patchTraceabilityMatrix(SAMPLE_SPEC, report).content;
    expect(patchTraceabilityMatrix(once, report).content).toBe(once);
  });

  it("keeps CRLF line endings", () => {
    const crlf = SAMPLE_SPEC.replace(/\n/g, "\r\n");
    const expected = patchTraceabilityMatrix(SAMPLE_SPEC, report).content.replace(/\n/g, "\r\n");
    expect(patchTraceabilityMatrix(crlf, report).content).toBe(expected);
  });

  it("returns a warning and leaves the text alone when the heading is missing", () => {
    const text = SAMPLE_SPEC.replace("## 7. Traceability Matrix", "## 7. Matrix");
    const result = patchTraceabilityMatrix(text, report);

    expect(result.applied).toBe(false);
    expect(result.content).toBe(text);
    if (!result.applied) {
      expect(result.warning).toBeInstanceOf(MissingAnchorError);
      expect(result.warning.anchor).toBe("## 7. Traceability Matrix");
    }
  });

  it("returns a warning when the table under the heading is missing", () => {
    const text = "---\nspec_id: SPEC-001\nfeature: X\n---\n\n## 7. Traceability Matrix\n\nNothing yet.\n";
    expect(patchTraceabilityMatrix(text, report).applied).toBe(false);
  });
});

describe("buildMatrixRows", () => {
  it("marks production-only references as implemented", () => {
    const rows = buildMatrixRows(reportFor([ref("REQ-001-E-01", "src/Error.kt")]));
    expect(rows).toEqual([
      { requirement: "REQ-001-E-01", codeFile: "src/Error.kt", testFile: "—", status: "🟢 Implemented" },
      { requirement: "REQ-001-U-01", codeFile: "—", testFile: "—", status: "⏳ Pending" },
    ]);
  });

  it("falls back to the test file for the code column", () => {
    const [row] = buildMatrixRows(reportFor([ref("REQ-001-E-01", "src/test/ErrorTest.kt", true)]));
    expect(row).toEqual({
      requirement: "REQ-001-E-01",
      codeFile: "src/test/ErrorTest.kt",
      testFile: "src/test/ErrorTest.kt",
      status: "✅ Tested",
    });
  });
});

describe("readMatrixRows", () => {
  it("parses the existing rows as structured data", () => {
    expect(readMatrixRows(SAMPLE_SPEC)).toEqual([
      { requirement: "REQ-001-U-01", codeFile: "[TBD]", testFile: "[TBD]", status: "⏳ Pending" },
      { requirement: "REQ-001-E-01", codeFile: "[TBD]", testFile: "[TBD]", status: "⏳ Pending" },
    ]);
  });
});
