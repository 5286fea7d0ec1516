import { Builtins, Cli } from "clipanion";
import { CapabilitiesCommand } from "./commands/capabilities.js";
import { CreateCommand } from "./commands/create.js";
import { GenerateCommand } from "./commands/generate.js";
import { SyncCommand } from "./commands/sync.js";
import { ValidateCommand } from "./commands/validate.js";
import { VerifyCommand } from "./commands/verify.js";

export const CLI_VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({ binaryLabel: "specsync", binaryName: "specsync", binaryVersion: CLI_VERSION });
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);
  cli.register(CreateCommand);
  cli.register(ValidateCommand);
  cli.register(VerifyCommand);
  cli.register(SyncCommand);
  cli.register(GenerateCommand);
  cli.register(CapabilitiesCommand);
  return cli;
}

export { CapabilitiesCommand, CreateCommand, GenerateCommand, SyncCommand, ValidateCommand, VerifyCommand };
export { EXIT_ERROR, EXIT_FAILURE, EXIT_OK, SpecsyncCommand } from "./commands/base.js";
export { PROJECT_CONFIG_FILENAME, defaultSettings, loadSettings } from "./config/settings.js";
export type { Settings, SettingsFile } from "./config/settings.js";
export { BundleSchema, DEFAULT_BUNDLE, TEMPLATES_DIR, createScaffoldContext, generateScaffold, loadBundle, toTypeName } from "./services/generator.js";
export type { BundleDefinition, GenerateScaffoldOptions, GenerateScaffoldResult, ScaffoldContext } from "./services/generator.js";
