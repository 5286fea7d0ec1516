import path from "node:path";
import fs from "fs-extra";
import { Option } from "clipanion";
import { NotFoundError, listSpecFiles, validateSpecText } from "@specsync/core";
import { formatValidation } from "../services/report.js";
import { EXIT_FAILURE, EXIT_OK, SpecsyncCommand } from "./base.js";

export class ValidateCommand extends SpecsyncCommand {
  static paths = [["validate"]];

  static usage = SpecsyncCommand.Usage({
    description: "Check requirement documents for required sections, header fields and ID formats",
    examples: [
      ["Validate one document", "specsync validate specs/user-login/SPEC.md"],
      ["Validate every document under the specs directory", "specsync validate --all"],
    ],
  });

  protected readonly commandName = "validate";

  all = Option.Boolean("--all", false, { description: "Validate every SPEC.md under the specs directory" });
  files = Option.Rest();

  async execute() {
    try {
      const targets = await this.collectTargets();
      if (targets === null) {
        return this.usage("pass one or more documents, or --all");
      }
      if (targets.length === 0) {
        this.context.stdout.write("No SPEC files found.\n");
        return EXIT_OK;
      }

      let invalid = 0;
      for (const target of targets) {
        if (!(await fs.pathExists(target))) {
          throw new NotFoundError(target, "file");
        }
        const result = validateSpecText(await fs.readFile(target, "utf8"));
        if (!result.valid) invalid += 1;
        const label = path.relative(this.resolveCwd(), target) || target;
        this.context.stdout.write(`${formatValidation(label, result).join("\n")}\n\n`);
      }

      this.context.stdout.write(`${targets.length - invalid}/${targets.length} valid\n`);
      return invalid > 0 ? EXIT_FAILURE : EXIT_OK;
    } catch (error) {
      return this.fail(error);
    }
  }

  private async collectTargets(): Promise<string[] | null> {
    const explicit = this.files.map(file => this.resolvePath(file));
    if (!this.all) {
      return explicit.length > 0 ? explicit : null;
    }
    const settings = await this.settings();
    return Array.from(new Set([...explicit, ...(await listSpecFiles(settings.specsDir))]));
  }
}
