import path from "node:path";
import { Option } from "clipanion";
import { readSpecDocument } from "@specsync/core";
import { generateScaffold } from "../services/generator.js";
import { formatWrittenFiles } from "../services/report.js";
import { EXIT_OK, SpecsyncCommand } from "./base.js";

export class GenerateCommand extends SpecsyncCommand {
  static paths = [["generate"]];

  static usage = SpecsyncCommand.Usage({
    description: "Render a layered Kotlin feature scaffold annotated with the document's SPEC ID",
    examples: [["Generate into ./app", "specsync generate specs/user-login/SPEC.md -o app --package com.example.auth"]],
  });

  protected readonly commandName = "generate";

  spec = Option.String({ required: true, name: "spec" });
  output = Option.String("-o,--output", { description: "Output directory" });
  packageName = Option.String("--package", { description: "Kotlin package name" });
  bundle = Option.String("--bundle", { description: "Directory of a custom template bundle" });

  async execute() {
    try {
      const settings = await this.settings();
      const { document } = await readSpecDocument(this.resolvePath(this.spec));
      const outputDir = this.output ? this.resolvePath(this.output) : settings.generate.outputDir;

      const result = await generateScaffold({
        document,
        outputDir,
        packageName: this.packageName ?? settings.generate.packageName,
        bundleDir: this.bundle ? this.resolvePath(this.bundle) : undefined,
      });

      this.context.stdout.write(`Generated ${document.specId} (${document.feature}) with ${result.bundle}\n`);
      this.context.stdout.write(
        `${formatWrittenFiles(result.outputs, filePath => path.relative(outputDir, filePath)).join("\n")}\n`
      );
      return EXIT_OK;
    } catch (error) {
      return this.fail(error);
    }
  }
}
