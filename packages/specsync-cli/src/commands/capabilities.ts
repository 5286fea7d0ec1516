import chalk from "chalk";
import { Option } from "clipanion";
import { CapabilityRegistry } from "@specsync/capabilities";
import { EXIT_OK, SpecsyncCommand } from "./base.js";

export class CapabilitiesCommand extends SpecsyncCommand {
  static paths = [["capabilities"]];

  static usage = SpecsyncCommand.Usage({
    description: "List the capability catalog used to fill related_capabilities",
  });

  protected readonly commandName = "capabilities";

  json = Option.Boolean("--json", false, { description: "Print the catalog as JSON" });
  category = Option.String("--category", { description: "Only list one category" });

  async execute() {
    const registry = new CapabilityRegistry();
    const entries = (this.category ? registry.byCategory(this.category) : registry.list()).sort((a, b) =>
      a.category.localeCompare(b.category)
    );

    if (this.json) {
      this.context.stdout.write(`${JSON.stringify(entries, null, 2)}\n`);
      return EXIT_OK;
    }

    const core = new Set(registry.toCatalog().coreTags);
    let currentCategory = "";
    for (const entry of entries) {
      if (entry.category !== currentCategory) {
        currentCategory = entry.category;
        this.context.stdout.write(`\n${chalk.bold(currentCategory)}\n`);
      }
      const badge = core.has(entry.tag) ? ` ${chalk.cyan("[core]")}` : "";
      this.context.stdout.write(`- ${entry.tag}${badge}: ${entry.description}\n`);
      this.context.stdout.write(`  ${chalk.dim(`keywords: ${entry.keywords.join(", ")}`)}\n`);
    }
    return EXIT_OK;
  }
}
