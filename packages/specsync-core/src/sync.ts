import path from "node:path";
import fs from "fs-extra";

import { NotFoundError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ScanResult, SpecDocument, SyncReport } from "./model/SpecDocument.js";
import { readSpecDocument } from "./parser.js";
import { scanSourceTree, type ScanOptions } from "./scanner.js";
import { computeTraceability, coveragePercent, formatPercent } from "./traceability.js";
import { ARCHITECTURE_FILE_NAME, renderArchitectureDocument } from "./writers/architecture.js";
import { patchTraceabilityMatrix } from "./writers/matrix.js";
import { STATUS_FILE_NAME, renderStatusDocument } from "./writers/status.js";

export interface VerifyOptions {
  specPath: string;
  codeDir: string;
  scan?: ScanOptions;
  logger?: Logger;
}

export interface SyncOptions extends VerifyOptions {
  /** Where README.md and architecture.md go; defaults to the document's directory. */
  outputDir?: string;
}

export interface VerifyResult {
  text: string;
  document: SpecDocument;
  scan: ScanResult;
  report: SyncReport;
}

export interface WrittenFile {
  path: string;
  changed: boolean;
}

export interface SyncResult extends VerifyResult {
  files: WrittenFile[];
  warnings: string[];
}

export async function writeIfChanged(filePath: string, content: string): Promise<WrittenFile> {
  if (await fs.pathExists(filePath)) {
    const existing = await fs.readFile(filePath, "utf8");
    if (existing === content) {
      return { path: filePath, changed: false };
    }
  }
  await fs.outputFile(filePath, content, "utf8");
  return { path: filePath, changed: true };
}

export async function verifySpec(options: VerifyOptions): Promise<VerifyResult> {
  const logger = options.logger ?? silentLogger;
  if (!(await fs.pathExists(options.specPath))) {
    throw new NotFoundError(options.specPath, "file");
  }
  if (!(await fs.pathExists(options.codeDir))) {
    throw new NotFoundError(options.codeDir, "directory");
  }

  const { text, document } = await readSpecDocument(options.specPath);
  logger.info(`Parsed ${document.specId} (${document.requirements.length} requirements)`);
  const scan = await scanSourceTree(options.codeDir, options.scan);
  logger.info(
    `Scanned ${scan.sourceFiles.length} source and ${scan.testFiles.length} test files, ${scan.references.size} annotated IDs`
  );
  const report = computeTraceability(document, scan);
  logger.info(
    `${report.implemented.size}/${report.totalRequirements} requirements implemented (${formatPercent(coveragePercent(report))})`
  );
  return { text, document, scan, report };
}

function toLinkPath(fromDir: string, target: string): string {
  return path.relative(fromDir, target).split(path.sep).join("/");
}

/**
 * Verifies, then patches the matrix in place and regenerates the status and
 * architecture documents. Unchanged files are left untouched on disk.
 */
export async function syncSpec(options: SyncOptions): Promise<SyncResult> {
  const logger = options.logger ?? silentLogger;
  const verified = await verifySpec(options);
  const outputDir = options.outputDir ?? path.dirname(options.specPath);
  const warnings: string[] = [];
  const files: WrittenFile[] = [];

  const patch = patchTraceabilityMatrix(verified.text, verified.report);
  if (patch.applied) {
    files.push(await writeIfChanged(options.specPath, patch.content));
  } else {
    logger.warn(patch.warning.message);
    warnings.push(patch.warning.message);
  }

  const statusPath = path.join(outputDir, STATUS_FILE_NAME);
  const architecturePath = path.join(outputDir, ARCHITECTURE_FILE_NAME);
  files.push(
    await writeIfChanged(
      statusPath,
      renderStatusDocument(verified.report, {
        specFileName: toLinkPath(outputDir, options.specPath),
        architectureFileName: ARCHITECTURE_FILE_NAME,
      })
    )
  );
  files.push(await writeIfChanged(architecturePath, renderArchitectureDocument(verified.report)));

  for (const file of files) {
    logger.info(`${file.changed ? "Updated" : "Unchanged"} ${file.path}`);
  }
  return { ...verified, files, warnings };
}
