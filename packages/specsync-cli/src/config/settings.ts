import path from "node:path";
import fs from "fs-extra";
import YAML from "yaml";
import { z } from "zod";
import { DEFAULT_SCAN_OPTIONS, silentLogger, type Logger, type ScanOptions } from "@specsync/core";

export const PROJECT_CONFIG_FILENAME = "specsync.config.yaml";

const NonEmpty = z
  .string()
  .transform(value => value.trim())
  .pipe(z.string().min(1));

const SettingsFileSchema = z
  .object({
    specs_dir: NonEmpty.optional(),
    author: NonEmpty.optional(),
    scan: z
      .object({
        extensions: z.array(NonEmpty.transform(value => value.replace(/^\./, ""))).min(1).optional(),
        comment_prefixes: z.array(NonEmpty).min(1).optional(),
        test_token: NonEmpty.optional(),
      })
      .strict()
      .optional(),
    generate: z
      .object({
        package: NonEmpty.pipe(
          z.string().regex(/^[A-Za-z_]\w*(\.[A-Za-z_]\w*)*$/, "package must be a dotted identifier")
        ).optional(),
        output: NonEmpty.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type SettingsFile = z.input<typeof SettingsFileSchema>;

export interface Settings {
  /** Absolute directory used to resolve the relative paths below. */
  cwd: string;
  specsDir: string;
  author: string;
  scan: Required<Pick<ScanOptions, "extensions" | "commentPrefixes" | "testToken">>;
  generate: { packageName: string; outputDir: string };
  /** Path of the file the settings came from, if any. */
  source: string | null;
}

export function defaultSettings(cwd: string): Settings {
  return {
    cwd,
    specsDir: path.join(cwd, "specs"),
    author: "Unknown",
    scan: {
      extensions: [...DEFAULT_SCAN_OPTIONS.extensions],
      commentPrefixes: [...DEFAULT_SCAN_OPTIONS.commentPrefixes],
      testToken: DEFAULT_SCAN_OPTIONS.testToken,
    },
    generate: { packageName: "com.example.app", outputDir: path.join(cwd, "generated") },
    source: null,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Reads `specsync.config.yaml` from `cwd`. A missing file yields defaults; an
 * unreadable or invalid one is reported through `logger` and also yields defaults.
 */
export async function loadSettings(cwd: string, logger: Logger = silentLogger): Promise<Settings> {
  const base = defaultSettings(cwd);
  const configPath = path.join(cwd, PROJECT_CONFIG_FILENAME);
  if (!(await fs.pathExists(configPath))) {
    return base;
  }

  let raw: unknown;
  try {
    const text = await fs.readFile(configPath, "utf8");
    raw = text.trim() ? YAML.parse(text) : {};
  } catch (error) {
    logger.warn(`Unable to read ${PROJECT_CONFIG_FILENAME}: ${error instanceof Error ? error.message : String(error)}`);
    return base;
  }

  const parsed = SettingsFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    logger.warn(`Ignoring invalid ${PROJECT_CONFIG_FILENAME}: ${formatIssues(parsed.error)}`);
    return base;
  }

  const file = parsed.data;
  return {
    cwd,
    specsDir: file.specs_dir ? path.resolve(cwd, file.specs_dir) : base.specsDir,
    author: file.author ?? base.author,
    scan: {
      extensions: file.scan?.extensions ?? base.scan.extensions,
      commentPrefixes: file.scan?.comment_prefixes ?? base.scan.commentPrefixes,
      testToken: file.scan?.test_token ?? base.scan.testToken,
    },
    generate: {
      packageName: file.generate?.package ?? base.generate.packageName,
      outputDir: file.generate?.output ? path.resolve(cwd, file.generate.output) : base.generate.outputDir,
    },
    source: configPath,
  };
}
