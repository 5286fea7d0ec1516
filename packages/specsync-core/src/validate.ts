import semver from "semver";

import { CAPABILITIES_FIELD, findRequirementIds, parseHeaderBlock, splitHeader } from "./parser.js";
import { MATRIX_HEADING, readMatrixRows } from "./writers/matrix.js";

export const REQUIRED_SECTIONS = [
  "## 1. Overview",
  "## 2. Requirements (EARS Format)",
  "## 3. User Stories",
  "## 4. Architecture (Clean Architecture)",
  "## 5. Related Capabilities",
  "## 6. Implementation Checklist",
  MATRIX_HEADING,
] as const;

export const REQUIRED_HEADER_FIELDS = ["spec_id", "feature", "status", "version", CAPABILITIES_FIELD] as const;

const EARS_SECTIONS = ["Ubiquitous Requirements", "State-Driven Requirements", "Event-Driven Requirements"];

const SPEC_ID_FORMAT = /^SPEC-\d+$/;
const STANDARD_REQUIREMENT_ID = /^REQ-\d+-[USEON]-\d+$/;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateSpecText(text: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const split = splitHeader(text);
  const body = split?.body ?? text;
  if (!split) {
    errors.push("Missing header block");
  } else {
    const { fields, lists } = parseHeaderBlock(split.header);
    for (const field of REQUIRED_HEADER_FIELDS) {
      if (!fields.has(field) && !lists.has(field)) {
        errors.push(`Missing required header field: ${field}`);
      }
    }
    if (lists.has(CAPABILITIES_FIELD) && (lists.get(CAPABILITIES_FIELD) ?? []).length === 0) {
      warnings.push(`No capabilities listed in ${CAPABILITIES_FIELD}`);
    }
    const specId = fields.get("spec_id");
    if (specId !== undefined && !SPEC_ID_FORMAT.test(specId)) {
      errors.push(`Invalid SPEC ID format: ${specId}`);
    }
    const version = fields.get("version");
    if (version !== undefined && semver.valid(version) === null) {
      warnings.push(`Version is not valid semver: ${version}`);
    }
  }

  const lines = new Set(text.split(/\r?\n/).map((line) => line.trim()));
  for (const section of REQUIRED_SECTIONS) {
    if (!lines.has(section)) {
      errors.push(`Missing required section: ${section}`);
    }
  }

  const ids = findRequirementIds(body);
  if (ids.length === 0) {
    warnings.push("No requirements found");
  }
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      warnings.push(`Duplicate requirement ID: ${id}`);
      continue;
    }
    seen.add(id);
    if (!id.startsWith("REQ-")) {
      errors.push(`Invalid requirement ID format: ${id}`);
    } else if (!STANDARD_REQUIREMENT_ID.test(id)) {
      warnings.push(`Non-standard requirement ID format: ${id}`);
    }
  }
  if (ids.length > 0) {
    for (const section of EARS_SECTIONS) {
      if (!text.includes(section)) {
        warnings.push(`No ${section} section found`);
      }
    }
  }

  if (lines.has(MATRIX_HEADING)) {
    const rows = readMatrixRows(text);
    if (rows === null) {
      warnings.push("Traceability matrix table not found under its heading");
    } else {
      for (const row of rows) {
        if (!seen.has(row.requirement)) {
          errors.push(`Traceability matrix names unknown requirement: ${row.requirement}`);
        }
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
