import path from "node:path";
import fs from "fs-extra";
import { Option } from "clipanion";
import * as t from "typanion";
import {
  SPEC_FILE_NAME,
  composeSpecDocument,
  featureSlug,
  nextSpecId,
  renderSpecDocument,
} from "@specsync/core";
import { loadCapabilityCatalog } from "@specsync/capabilities";
import { summaryBox } from "../services/report.js";
import { EXIT_OK, SpecsyncCommand } from "./base.js";

export class CreateCommand extends SpecsyncCommand {
  static paths = [["create"]];

  static usage = SpecsyncCommand.Usage({
    description: "Create a requirement document with EARS-formatted requirements",
    examples: [
      [
        "Create a login feature",
        'specsync create "User Login" -p "Let users sign in" -r "validate credentials" -r "show an error when login fails"',
      ],
    ],
  });

  protected readonly commandName = "create";

  feature = Option.String({ required: true, name: "feature" });
  purpose = Option.String("-p,--purpose", "", { description: "Why the feature exists" });
  requirements = Option.Array("-r,--requirement", [], { description: "Requirement text; repeat for more" });
  author = Option.String("--author", { description: "Author recorded in the header" });
  id = Option.String("--id", {
    description: "Explicit SPEC-NNN identifier",
    validator: t.cascade(t.isString(), [t.matchesRegExp(/^SPEC-\d+$/)]),
  });
  specsDir = Option.String("--specs-dir", { description: "Directory that holds one folder per document" });
  force = Option.Boolean("--force", false, { description: "Overwrite an existing document" });

  async execute() {
    const feature = this.feature.trim();
    if (!feature) {
      return this.usage("feature name is required");
    }
    if (this.requirements.every(item => !item.trim())) {
      return this.usage("at least one --requirement is needed");
    }

    try {
      const settings = await this.settings();
      const specsDir = this.specsDir ? this.resolvePath(this.specsDir) : settings.specsDir;
      const specId = this.id ?? (await nextSpecId(specsDir));
      const specPath = path.join(specsDir, featureSlug(feature), SPEC_FILE_NAME);
      if (!this.force && (await fs.pathExists(specPath))) {
        return this.usage(`${specPath} already exists (use --force to overwrite)`);
      }

      const catalog = loadCapabilityCatalog();
      const document = composeSpecDocument(
        {
          specId,
          feature,
          purpose: this.purpose,
          requirements: this.requirements,
          author: this.author ?? settings.author,
        },
        catalog
      );
      await fs.outputFile(specPath, renderSpecDocument(document, catalog), "utf8");
      this.logger().info(`Wrote ${specPath}`);

      this.context.stdout.write(
        `${summaryBox("SPEC created", [
          ["SPEC ID", document.specId],
          ["Location", path.relative(this.resolveCwd(), specPath) || specPath],
          ["Requirements", document.requirements.length],
          ["Capabilities", document.relatedCapabilities.join(", ")],
        ])}\n`
      );
      return EXIT_OK;
    } catch (error) {
      return this.fail(error);
    }
  }
}
