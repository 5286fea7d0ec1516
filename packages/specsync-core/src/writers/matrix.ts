import { MissingAnchorError } from "../errors.js";
import type { SyncReport } from "../model/SpecDocument.js";
import { allRequirementIds, referencesFor } from "../traceability.js";

export const MATRIX_HEADING = "## 7. Traceability Matrix";
export const MATRIX_COLUMNS = ["Requirement", "Code File", "Test File", "Status"] as const;
export const MATRIX_HEADER = `| ${MATRIX_COLUMNS.join(" | ")} |`;
export const MATRIX_SEPARATOR = "|-------------|-----------|-----------|--------|";
export const PLACEHOLDER = "—";

export const MATRIX_STATUS = {
  pending: "⏳ Pending",
  implemented: "🟢 Implemented",
  tested: "✅ Tested",
  failed: "❌ Failed",
} as const;

export interface MatrixRow {
  requirement: string;
  codeFile: string;
  testFile: string;
  status: string;
}

export interface MatrixBlock {
  /** Line index of the table header row. */
  headerIndex: number;
  /** Line index one past the last table row. */
  endIndex: number;
  rows: MatrixRow[];
}

export type MatrixPatchResult =
  | { applied: true; content: string; rows: MatrixRow[] }
  | { applied: false; content: string; warning: MissingAnchorError };

export function splitTableCells(line: string): string[] | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("|")) return null;
  const inner = trimmed.replace(/^\|/, "").replace(/(?<!\\)\|$/, "");
  return inner.split(/(?<!\\)\|/).map((cell) => cell.trim());
}

function isSeparatorRow(line: string): boolean {
  const cells = splitTableCells(line);
  return cells !== null && cells.length > 0 && cells.every((cell) => /^:?-+:?$/.test(cell));
}

function isMatrixHeader(line: string): boolean {
  const cells = splitTableCells(line);
  return (
    cells !== null &&
    cells.length === MATRIX_COLUMNS.length &&
    cells.every((cell, index) => cell === MATRIX_COLUMNS[index])
  );
}

function toRow(cells: string[]): MatrixRow {
  const [requirement = "", codeFile = "", testFile = "", status = ""] = cells;
  return { requirement, codeFile, testFile, status };
}

/** Finds the matrix table under its heading; null when either anchor is absent. */
export function locateMatrix(lines: readonly string[]): MatrixBlock | null {
  const headingIndex = lines.findIndex((line) => line.trim() === MATRIX_HEADING);
  if (headingIndex < 0) return null;

  let headerIndex = headingIndex + 1;
  while (headerIndex < lines.length && lines[headerIndex].trim() === "") {
    headerIndex += 1;
  }
  if (headerIndex + 1 >= lines.length) return null;
  if (!isMatrixHeader(lines[headerIndex]) || !isSeparatorRow(lines[headerIndex + 1])) {
    return null;
  }

  const rows: MatrixRow[] = [];
  let endIndex = headerIndex + 2;
  while (endIndex < lines.length) {
    const cells = splitTableCells(lines[endIndex]);
    if (!cells) break;
    rows.push(toRow(cells));
    endIndex += 1;
  }
  return { headerIndex, endIndex, rows };
}

export function readMatrixRows(text: string): MatrixRow[] | null {
  return locateMatrix(text.split(/\r?\n/))?.rows ?? null;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

export function formatMatrixRow(row: MatrixRow): string {
  return `| ${escapeCell(row.requirement)} | ${escapeCell(row.codeFile)} | ${escapeCell(row.testFile)} | ${row.status} |`;
}

/**
 * One row per tracked requirement, sorted by ID. The code column prefers a
 * production file; the test column names the first test file carrying the ID.
 */
export function buildMatrixRows(report: Pick<SyncReport, "implemented" | "missing" | "references">): MatrixRow[] {
  return allRequirementIds(report).map((id) => {
    if (!report.implemented.has(id)) {
      return { requirement: id, codeFile: PLACEHOLDER, testFile: PLACEHOLDER, status: MATRIX_STATUS.pending };
    }
    const refs = referencesFor(report, id);
    const code = refs.find((ref) => !ref.inTestFile) ?? refs[0];
    const test = refs.find((ref) => ref.inTestFile);
    return {
      requirement: id,
      codeFile: code?.filePath ?? PLACEHOLDER,
      testFile: test?.filePath ?? PLACEHOLDER,
      status: test ? MATRIX_STATUS.tested : MATRIX_STATUS.implemented,
    };
  });
}

export function renderMatrixTable(rows: readonly MatrixRow[]): string[] {
  return [MATRIX_HEADER, MATRIX_SEPARATOR, ...rows.map(formatMatrixRow)];
}

/** Replaces the whole table under the matrix heading. Existing rows are discarded. */
export function patchTraceabilityMatrix(
  text: string,
  report: Pick<SyncReport, "implemented" | "missing" | "references">
): MatrixPatchResult {
  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  const lines = text.split(/\r?\n/);
  const block = locateMatrix(lines);
  if (!block) {
    return {
      applied: false,
      content: text,
      warning: new MissingAnchorError(
        `Traceability matrix section not found (expected '${MATRIX_HEADING}' followed by the matrix table)`,
        MATRIX_HEADING
      ),
    };
  }
  const rows = buildMatrixRows(report);
  const next = [
    ...lines.slice(0, block.headerIndex),
    ...renderMatrixTable(rows),
    ...lines.slice(block.endIndex),
  ];
  return { applied: true, content: next.join(eol), rows };
}
