import { Option } from "clipanion";
import { verifySpec } from "@specsync/core";
import { formatVerification, reportToJson } from "../services/report.js";
import { EXIT_FAILURE, EXIT_OK, SpecsyncCommand } from "./base.js";

export class VerifyCommand extends SpecsyncCommand {
  static paths = [["verify"]];

  static usage = SpecsyncCommand.Usage({
    description: "Report which requirements are referenced in code; exits 1 while any are missing",
    examples: [["Verify against ./app", "specsync verify specs/user-login/SPEC.md -c app"]],
  });

  protected readonly commandName = "verify";

  spec = Option.String({ required: true, name: "spec" });
  code = Option.String("-c,--code", { required: true, description: "Source tree to scan for annotations" });
  json = Option.Boolean("--json", false, { description: "Print the report as JSON" });

  async execute() {
    try {
      const settings = await this.settings();
      const { report } = await verifySpec({
        specPath: this.resolvePath(this.spec),
        codeDir: this.resolvePath(this.code),
        scan: this.scanOptions(settings),
        logger: this.logger(),
      });

      if (this.json) {
        this.context.stdout.write(`${JSON.stringify(reportToJson(report), null, 2)}\n`);
      } else {
        this.context.stdout.write(`${formatVerification(report).join("\n")}\n`);
      }
      return report.missing.size > 0 ? EXIT_FAILURE : EXIT_OK;
    } catch (error) {
      return this.fail(error);
    }
  }
}
