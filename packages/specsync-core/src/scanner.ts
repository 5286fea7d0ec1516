import path from "node:path";
import fs from "fs-extra";
import { globby } from "globby";

import { NotFoundError } from "./errors.js";
import { compareIds, type CodeReference, type ScanResult } from "./model/SpecDocument.js";

export interface ScanOptions {
  /** File extensions without the dot. */
  extensions?: readonly string[];
  /** Line-comment tokens that may precede an annotation. */
  commentPrefixes?: readonly string[];
  /** Token counted once per test method in test files. */
  testToken?: string;
  ignore?: readonly string[];
}

export const DEFAULT_SCAN_OPTIONS = {
  extensions: ["kt"],
  commentPrefixes: ["//"],
  testToken: "@Test",
  // Build output only at the root or one module down; deeper `build` segments are source packages.
  ignore: ["**/node_modules/**", "**/.git/**", ".gradle/**", "build/**", "*/build/**"],
} as const satisfies Required<ScanOptions>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function buildAnnotationPattern(commentPrefixes: readonly string[]): RegExp {
  const prefixes = commentPrefixes.map(escapeRegExp).join("|");
  return new RegExp(`(?:${prefixes})\\s*((?:SPEC|REQ)-[A-Z0-9-]+)`, "g");
}

export function isTestFile(relPath: string): boolean {
  const segments = relPath.split("/");
  const fileName = segments[segments.length - 1] ?? "";
  return segments.slice(0, -1).includes("test") || /Test\.[A-Za-z0-9]+$/.test(fileName);
}

export function extractAnnotations(
  content: string,
  filePath: string,
  pattern: RegExp,
  inTestFile = false
): CodeReference[] {
  const references: CodeReference[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    for (const match of line.matchAll(pattern)) {
      references.push({ filePath, line: index + 1, requirementId: match[1], inTestFile });
    }
  });
  return references;
}

export function countOccurrences(content: string, token: string): number {
  if (!token) return 0;
  return content.split(token).length - 1;
}

export async function listSourceFiles(rootDir: string, options: ScanOptions = {}): Promise<string[]> {
  const extensions = options.extensions ?? DEFAULT_SCAN_OPTIONS.extensions;
  const files = await globby(
    extensions.map((ext) => `**/*.${ext.replace(/^\./, "")}`),
    {
      cwd: rootDir,
      onlyFiles: true,
      dot: true,
      ignore: [...(options.ignore ?? DEFAULT_SCAN_OPTIONS.ignore)],
    }
  );
  return files.map((file) => file.split(path.sep).join("/")).sort(compareIds);
}

/**
 * Walks `rootDir` and collects every `// REQ-…` / `// SPEC-…` annotation.
 * Files are visited in sorted order so the first reference for an ID is stable.
 */
export async function scanSourceTree(rootDir: string, options: ScanOptions = {}): Promise<ScanResult> {
  if (!(await fs.pathExists(rootDir))) {
    throw new NotFoundError(rootDir, "directory");
  }
  const pattern = buildAnnotationPattern(options.commentPrefixes ?? DEFAULT_SCAN_OPTIONS.commentPrefixes);
  const testToken = options.testToken ?? DEFAULT_SCAN_OPTIONS.testToken;

  const references = new Map<string, CodeReference[]>();
  const sourceFiles: string[] = [];
  const testFiles: string[] = [];
  let testMethodCount = 0;

  for (const relPath of await listSourceFiles(rootDir, options)) {
    const content = await fs.readFile(path.join(rootDir, relPath), "utf8");
    const inTestFile = isTestFile(relPath);
    if (inTestFile) {
      testFiles.push(relPath);
      testMethodCount += countOccurrences(content, testToken);
    } else {
      sourceFiles.push(relPath);
    }
    for (const reference of extractAnnotations(content, relPath, pattern, inTestFile)) {
      const bucket = references.get(reference.requirementId) ?? [];
      bucket.push(reference);
      references.set(reference.requirementId, bucket);
    }
  }

  return { references, sourceFiles, testFiles, testMethodCount };
}
