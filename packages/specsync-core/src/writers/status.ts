import type { SyncReport } from "../model/SpecDocument.js";
import { coveragePercent, formatPercent, sortedIds } from "../traceability.js";

export const STATUS_FILE_NAME = "README.md";
export const GENERATED_FOOTER = "*Generated by specsync*";

export interface StatusDocumentOptions {
  /** Link target for the source document, relative to the status file. */
  specFileName?: string;
  architectureFileName?: string;
}

const ARCHITECTURE_SUMMARY = [
  "## Architecture",
  "",
  "This feature follows Clean Architecture with three layers:",
  "",
  "### Domain Layer",
  "- Models: Pure business objects",
  "- Use Cases: Business logic",
  "- Repository Interfaces: Data access contracts",
  "",
  "### Data Layer",
  "- API: Network data source",
  "- DTOs: Data transfer objects",
  "- Repository Implementation: Data access logic",
  "",
  "### Presentation Layer",
  "- ViewModel: State management",
  "- State: UI state definitions",
  "- Screen: Compose UI",
];

function relativeLink(target: string): string {
  return target.startsWith(".") ? target : `./${target}`;
}

function fileList(files: readonly string[]): string[] {
  return sortedIds(files).map((file) => `- \`${file}\``);
}

export function renderStatusDocument(report: SyncReport, options: StatusDocumentOptions = {}): string {
  const specFileName = options.specFileName ?? "SPEC.md";
  const architectureFileName = options.architectureFileName ?? "architecture.md";
  const percent = formatPercent(coveragePercent(report));

  const lines: string[] = [
    `# ${report.feature}`,
    "",
    "## Overview",
    "",
    `SPEC ID: ${report.specId}`,
    "",
    "## Implementation Status",
    "",
    `- **Requirements**: ${report.implemented.size}/${report.totalRequirements} implemented (${percent})`,
    `- **Source Files**: ${report.sourceFiles.length}`,
    `- **Test Files**: ${report.testFiles.length}`,
    `- **Test Methods**: ${report.testMethodCount}`,
    "",
    "## Requirements",
    "",
    "### Implemented",
    "",
    ...sortedIds(report.implemented).map((id) => `- ✅ ${id}`),
  ];

  if (report.missing.size > 0) {
    lines.push("", "### Pending", "", ...sortedIds(report.missing).map((id) => `- ⏳ ${id}`));
  }

  lines.push(
    "",
    ...ARCHITECTURE_SUMMARY,
    "",
    "## Files",
    "",
    "### Source Files",
    "",
    ...fileList(report.sourceFiles),
    "",
    "### Test Files",
    "",
    ...fileList(report.testFiles),
    "",
    "## References",
    "",
    `- [SPEC Document](${relativeLink(specFileName)})`,
    `- [Architecture Diagram](${relativeLink(architectureFileName)})`,
    "",
    "---",
    "",
    GENERATED_FOOTER,
    ""
  );
  return lines.join("\n");
}
