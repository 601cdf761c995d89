import * as fs from "fs";
import { GeneratorOptions } from "./interfaces";

export class Printer {
  readonly dryRun: boolean;
  readonly quiet: boolean;
  readonly verbose: boolean;

  constructor(options: GeneratorOptions = {}) {
    if (options.verbose && options.quiet) {
      throw new Error("cannot use --verbose and --quiet together");
    }

    this.dryRun = options.dryRun ?? false;
    this.quiet = options.quiet ?? false;
    this.verbose = options.verbose ?? false;
  }

  info(message: string): void {
    if (this.quiet) return;
    console.log(message);
  }

  debug(message: string): void {
    if (this.quiet || !this.verbose) return;
    console.log(message);
  }

  // Renders in dry-run mode too; only the write is skipped
  writeFile(filePath: string, render: () => string): void {
    let content: string;
    try {
      content = render();
    } catch (error) {
      throw new Error(`render ${filePath}: ${error instanceof Error ? error.message : error}`);
    }

    if (this.dryRun) {
      this.info(`📝 Dry run: would write ${filePath}`);
      return;
    }

    fs.writeFileSync(filePath, content);
  }
}
