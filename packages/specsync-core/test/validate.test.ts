import { describe, expect, it } from "vitest";

import { composeSpecDocument, renderSpecDocument } from "../src/compose.js";
import { validateSpecText } from "../src/validate.js";
import { SAMPLE_SPEC, TEST_CATALOG } from "./helpers.js";

const VALID_SPEC = renderSpecDocument(
  composeSpecDocument(
    {
      specId: "SPEC-001",
      feature: "User Login",
      purpose: "Let users sign in",
      requirements: ["validate credentials", "keep the session while the app is open", "show an error when login fails"],
      author: "Test Author",
      date: "2024-01-01",
    },
    TEST_CATALOG
  ),
  TEST_CATALOG
);

describe("validateSpecText", () => {
  it("accepts a freshly rendered document without warnings", () => {
    expect(validateSpecText(VALID_SPEC)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports missing sections as errors", () => {
    const result = validateSpecText(SAMPLE_SPEC);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "Missing required section: ## 3. User Stories",
      "Missing required section: ## 4. Architecture (Clean Architecture)",
      "Missing required section: ## 5. Related Capabilities",
      "Missing required section: ## 6. Implementation Checklist",
    ]);
  });

  it("rejects a document without a header", () => {
    const result = validateSpecText("# Title\n");
    expect(result.errors[0]).toBe("Missing header block");
    expect(result.warnings).toContain("No requirements found");
  });

  it("rejects requirement IDs without the REQ- prefix", () => {
    const text = VALID_SPEC.replace("- **REQ-001-U-01**:", "- **FR-001**: legacy\n- **REQ-001-U-01**:");
    expect(validateSpecText(text).errors).toEqual(["Invalid requirement ID format: FR-001"]);
  });

  it("checks requirement lines that have no description yet", () => {
    const text = VALID_SPEC.replace("- **REQ-001-U-01**:", "- **FR-002**:\n- **REQ-001-U-01**:");
    expect(validateSpecText(text).errors).toEqual(["Invalid requirement ID format: FR-002"]);
  });

  it("rejects a malformed spec ID", () => {
    const text = VALID_SPEC.replace("spec_id: SPEC-001", "spec_id: LOGIN-1");
    expect(validateSpecText(text).errors).toEqual(["Invalid SPEC ID format: LOGIN-1"]);
  });

  it("rejects matrix rows for unknown requirements", () => {
    const text = VALID_SPEC.replace("| REQ-001-E-01 | [TBD]", "| REQ-001-E-09 | [TBD]");
    expect(validateSpecText(text).errors).toEqual(["Traceability matrix names unknown requirement: REQ-001-E-09"]);
  });

  it("warns about versions that are not semver", () => {
    const text = VALID_SPEC.replace("version: 1.0.0", "version: 1.0");
    const result = validateSpecText(text);
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["Version is not valid semver: 1.0"]);
  });

  it("warns about duplicate and non-standard IDs", () => {
    const text = VALID_SPEC.replace(
      "- **REQ-001-U-01**:",
      "- **REQ-001-U-01**: again\n- **REQ-LOGIN-1**: custom\n- **REQ-001-U-01**:"
    );
    const result = validateSpecText(text);
    expect(result.warnings).toEqual([
      "Non-standard requirement ID format: REQ-LOGIN-1",
      "Duplicate requirement ID: REQ-001-U-01",
    ]);
  });

  it("warns about an empty capability list", () => {
    const text = VALID_SPEC.replace(/related_capabilities:\n(  - .+\n)+/, "related_capabilities:\n");
    expect(validateSpecText(text).warnings).toEqual(["No capabilities listed in related_capabilities"]);
  });
});
