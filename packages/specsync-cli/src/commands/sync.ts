import path from "node:path";
import { Option } from "clipanion";
import { coveragePercent, formatPercent, syncSpec } from "@specsync/core";
import { formatWrittenFiles, summaryBox } from "../services/report.js";
import { EXIT_OK, SpecsyncCommand } from "./base.js";

export class SyncCommand extends SpecsyncCommand {
  static paths = [["sync"]];

  static usage = SpecsyncCommand.Usage({
    description: "Refresh the traceability matrix, README.md and architecture.md from code annotations",
    examples: [["Sync against ./app", "specsync sync specs/user-login/SPEC.md -c app"]],
  });

  protected readonly commandName = "sync";

  spec = Option.String({ required: true, name: "spec" });
  code = Option.String("-c,--code", { required: true, description: "Source tree to scan for annotations" });
  outputDir = Option.String("--output-dir", { description: "Where README.md and architecture.md are written" });

  async execute() {
    try {
      const settings = await this.settings();
      const result = await syncSpec({
        specPath: this.resolvePath(this.spec),
        codeDir: this.resolvePath(this.code),
        outputDir: this.outputDir ? this.resolvePath(this.outputDir) : undefined,
        scan: this.scanOptions(settings),
        logger: this.logger(),
      });

      const cwd = this.resolveCwd();
      this.context.stdout.write(
        `${formatWrittenFiles(result.files, filePath => path.relative(cwd, filePath)).join("\n")}\n`
      );

      const { report } = result;
      this.context.stdout.write(
        `${summaryBox("Sync complete", [
          ["SPEC ID", report.specId],
          ["Implemented", `${report.implemented.size}/${report.totalRequirements} (${formatPercent(coveragePercent(report))})`],
          ["Source files", report.sourceFiles.length],
          ["Test files", report.testFiles.length],
          ["Test methods", report.testMethodCount],
          ["Warnings", result.warnings.length],
        ])}\n`
      );
      return EXIT_OK;
    } catch (error) {
      return this.fail(error);
    }
  }
}
