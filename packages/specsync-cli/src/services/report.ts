import boxen from "boxen";
import chalk from "chalk";
import {
  coveragePercent,
  formatPercent,
  sortedIds,
  referencesFor,
  type SyncReport,
  type ValidationResult,
  type WrittenFile,
} from "@specsync/core";

export function summaryBox(title: string, rows: ReadonlyArray<readonly [string, string | number]>): string {
  const width = Math.max(...rows.map(([label]) => label.length));
  const body = rows.map(([label, value]) => `${chalk.bold(label.padEnd(width))}  ${value}`).join("\n");
  return boxen(body, { title, padding: 1, borderStyle: "round" });
}

export function formatValidation(filePath: string, result: ValidationResult): string[] {
  const lines = [chalk.bold(`Validating: ${filePath}`)];
  for (const error of result.errors) {
    lines.push(`  ${chalk.red("✗")} ${error}`);
  }
  for (const warning of result.warnings) {
    lines.push(`  ${chalk.yellow("⚠")} ${warning}`);
  }
  if (!result.valid) {
    lines.push(chalk.red("✗ SPEC validation failed"));
  } else if (result.warnings.length > 0) {
    lines.push(chalk.green("✓ SPEC is valid (with warnings)"));
  } else {
    lines.push(chalk.green("✓ SPEC is valid"));
  }
  return lines;
}

export function formatVerification(report: SyncReport): string[] {
  const lines = [
    chalk.bold(`${report.specId}: ${report.feature}`),
    `Requirements: ${report.implemented.size}/${report.totalRequirements} implemented (${formatPercent(coveragePercent(report))})`,
    `Source files: ${report.sourceFiles.length}, test files: ${report.testFiles.length}, test methods: ${report.testMethodCount}`,
  ];
  for (const id of sortedIds(report.implemented)) {
    const where = referencesFor(report, id)
      .map(reference => `${reference.filePath}:${reference.line}`)
      .join(", ");
    lines.push(`  ${chalk.green("✓")} ${id} ${chalk.dim(where)}`);
  }
  for (const id of sortedIds(report.missing)) {
    lines.push(`  ${chalk.red("✗")} ${id} ${chalk.dim("not referenced")}`);
  }
  return lines;
}

export function formatWrittenFiles(files: readonly WrittenFile[], relativeTo: (filePath: string) => string): string[] {
  return files.map(file =>
    file.changed ? `${chalk.green("updated")}   ${relativeTo(file.path)}` : `${chalk.dim("unchanged")} ${relativeTo(file.path)}`
  );
}

export function reportToJson(report: SyncReport) {
  return {
    specId: report.specId,
    feature: report.feature,
    totalRequirements: report.totalRequirements,
    coverage: Number(coveragePercent(report).toFixed(1)),
    implemented: sortedIds(report.implemented),
    missing: sortedIds(report.missing),
    sourceFiles: [...report.sourceFiles],
    testFiles: [...report.testFiles],
    testMethodCount: report.testMethodCount,
    references: Object.fromEntries(
      sortedIds(report.implemented).map(id => [
        id,
        referencesFor(report, id).map(reference => ({
          file: reference.filePath,
          line: reference.line,
          test: reference.inTestFile,
        })),
      ])
    ),
  };
}
