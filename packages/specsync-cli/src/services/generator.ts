import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "fs-extra";
import nunjucks from "nunjucks";
import YAML from "yaml";
import { z } from "zod";
import { writeIfChanged, type SpecDocument, type WrittenFile } from "@specsync/core";

export const TEMPLATES_DIR = fileURLToPath(new URL("../../templates", import.meta.url));
export const DEFAULT_BUNDLE = "kotlin";
const BUNDLE_FILE = "bundle.yaml";

export const BundleSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  engine: z.enum(["nunjucks"]),
  outputs: z
    .array(z.object({ id: z.string().min(1), from: z.string().min(1), to: z.string().min(1) }))
    .min(1),
});

export type BundleDefinition = z.infer<typeof BundleSchema> & { dir: string };

export interface ScaffoldContext {
  spec: SpecDocument;
  name: string;
  packageName: string;
  packagePath: string;
}

export interface GenerateScaffoldOptions {
  document: SpecDocument;
  outputDir: string;
  packageName: string;
  bundleDir?: string;
}

export interface GenerateScaffoldResult {
  bundle: string;
  outputs: WrittenFile[];
}

/** "user login-form" → "UserLoginForm" */
export function toTypeName(feature: string): string {
  return feature
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

export async function loadBundle(bundleDir: string): Promise<BundleDefinition> {
  const bundlePath = path.join(bundleDir, BUNDLE_FILE);
  if (!(await fs.pathExists(bundlePath))) {
    throw new Error(`Template bundle not found: ${bundlePath}`);
  }
  const parsed = BundleSchema.safeParse(YAML.parse(await fs.readFile(bundlePath, "utf8")));
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid ${BUNDLE_FILE} in ${bundleDir}: ${detail}`);
  }
  return { ...parsed.data, dir: bundleDir };
}

export function createScaffoldContext(document: SpecDocument, packageName: string): ScaffoldContext {
  const name = toTypeName(document.feature);
  if (!name) {
    throw new Error(`Feature '${document.feature}' does not yield a type name`);
  }
  return { spec: document, name, packageName, packagePath: packageName.split(".").join("/") };
}

export async function generateScaffold(options: GenerateScaffoldOptions): Promise<GenerateScaffoldResult> {
  const bundle = await loadBundle(options.bundleDir ?? path.join(TEMPLATES_DIR, DEFAULT_BUNDLE));
  const env = nunjucks.configure(bundle.dir, {
    autoescape: false,
    throwOnUndefined: true,
    noCache: true,
  });
  const context = createScaffoldContext(options.document, options.packageName);
  const outputDir = path.resolve(options.outputDir);

  const outputs: WrittenFile[] = [];
  for (const output of bundle.outputs) {
    const targetRel = env.renderString(output.to, context).trim();
    const targetPath = path.resolve(outputDir, targetRel);
    if (!targetRel || path.relative(outputDir, targetPath).startsWith("..")) {
      throw new Error(`Bundle '${bundle.id}' output '${output.id}' resolves outside ${outputDir}`);
    }
    const rendered = env.render(output.from, context);
    outputs.push(await writeIfChanged(targetPath, rendered));
  }
  return { bundle: bundle.id, outputs };
}
