import path from "node:path";
import chalk from "chalk";
import { Command, Option } from "clipanion";
import { createLogger, type Logger, type ScanOptions } from "@specsync/core";
import { loadSettings, type Settings } from "../config/settings.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_ERROR = 2;

export abstract class SpecsyncCommand extends Command {
  cwd = Option.String("--cwd", { description: "Directory to resolve paths and specsync.config.yaml against" });

  verbose = Option.Boolean("--verbose", false, { description: "Print progress messages on stderr" });

  protected abstract readonly commandName: string;

  protected resolveCwd(): string {
    return path.resolve(process.cwd(), this.cwd ?? ".");
  }

  protected resolvePath(value: string): string {
    return path.resolve(this.resolveCwd(), value);
  }

  protected logger(scope: string = this.commandName): Logger {
    const stderr = this.context.stderr;
    return createLogger(scope, {
      info: (message: string) => {
        if (this.verbose) stderr.write(`${chalk.dim(message)}\n`);
      },
      warn: (message: string) => {
        stderr.write(`${chalk.yellow(message)}\n`);
      },
    });
  }

  protected async settings(): Promise<Settings> {
    return loadSettings(this.resolveCwd(), this.logger("config"));
  }

  protected scanOptions(settings: Settings): ScanOptions {
    return {
      extensions: settings.scan.extensions,
      commentPrefixes: settings.scan.commentPrefixes,
      testToken: settings.scan.testToken,
    };
  }

  protected usage(message: string): number {
    this.context.stderr.write(`specsync ${this.commandName} failed: ${message}\n`);
    return EXIT_FAILURE;
  }

  /** Reports an unexpected error; I/O and parse failures share exit code 2. */
  protected fail(error: unknown): number {
    const message = error instanceof Error ? error.message : String(error);
    this.context.stderr.write(`specsync ${this.commandName} failed: ${message}\n`);
    return EXIT_ERROR;
  }
}
