import * as fs from "fs";
import * as path from "path";
import YAML from "yaml";
import { GeneratorOptions, PackageSpec, ResolvedPackage } from "./interfaces";
import { Printer } from "./output";
import { CdnResolver } from "./resolver";
import { isObjectRecord } from "./utils";

const TEMPLATE_EXTENSION = ".mdx.tmpl";
const PLACEHOLDER_PATTERN =
  /\{(name|packageName|version|file|integrity|src)\}/g;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseDataFile(content: string, dataPath: string): PackageSpec[] {
  let data: unknown;
  try {
    data = YAML.parse(content);
  } catch (error) {
    throw new Error(`Invalid YAML in ${dataPath}: ${describeError(error)}`);
  }

  if (!Array.isArray(data)) {
    throw new Error(`Data file ${dataPath} must contain a list of packages`);
  }

  return data.map((entry: unknown, index) => {
    if (!isObjectRecord(entry) || typeof entry["name"] !== "string") {
      throw new Error(`Entry #${index + 1} in ${dataPath} needs a name`);
    }

    const spec: PackageSpec = { name: entry["name"] };
    if (typeof entry["file"] === "string") {
      spec.file = entry["file"];
    }
    if (typeof entry["pkg"] === "string") {
      spec.packageName = entry["pkg"];
    }
    return spec;
  });
}

export function renderTemplate(
  template: string,
  resolved: ResolvedPackage,
  templatePath: string
): string {
  let replaced = 0;
  const output = template.replace(PLACEHOLDER_PATTERN, (_match, key: string) => {
    replaced++;
    switch (key) {
      case "name":
        return resolved.name;
      case "packageName":
        return resolved.packageName;
      case "version":
        return resolved.version;
      case "file":
        return resolved.file;
      case "integrity":
        return resolved.integrity;
      default:
        return resolved.src;
    }
  });

  if (replaced === 0) {
    throw new Error(`Template ${templatePath} has no placeholders`);
  }
  return output;
}

export class CdnSnippetGenerator {
  private dataPath: string;
  private templateDir: string;
  private outputDir: string;
  private printer: Printer;
  private resolver: CdnResolver;

  constructor(
    dataPath: string = "./cdn.yml",
    templateDir: string = "./templates",
    outputDir: string = "./snippets",
    options: GeneratorOptions = {},
    resolver: CdnResolver = new CdnResolver()
  ) {
    this.dataPath = dataPath;
    this.templateDir = templateDir;
    this.outputDir = outputDir;
    this.printer = new Printer(options);
    this.resolver = resolver;
  }

  async generateSnippets(signal?: AbortSignal): Promise<ResolvedPackage[]> {
    this.validateOptions();

    const packages = this.readDataFile();
    this.printer.debug(`📖 Loaded ${packages.length} packages from ${this.dataPath}`);

    if (!this.printer.dryRun) {
      fs.mkdirSync(this.outputDir, { recursive: true });
    }

    const written: ResolvedPackage[] = [];
    for (const pkg of packages) {
      written.push(await this.writePackage(pkg, signal));
    }

    this.printer.debug(`✅ Generated ${written.length} snippets in ${this.outputDir}`);
    return written;
  }

  findTemplate(name: string): string {
    const primary = path.join(this.templateDir, name + TEMPLATE_EXTENSION);
    if (fs.existsSync(primary) && fs.statSync(primary).isFile()) {
      return primary;
    }

    const matches = fs
      .readdirSync(this.templateDir)
      .filter((file) => file.startsWith(name))
      .map((file) => path.join(this.templateDir, file))
      .sort();

    if (matches.length === 0) {
      throw new Error(
        `no template files matched ${path.join(this.templateDir, name + "*")}`
      );
    }

    if (matches.length > 1) {
      throw new Error(
        `multiple template files matched for ${name}: ${matches.join(", ")}`
      );
    }

    return matches[0];
  }

  private async writePackage(
    pkg: PackageSpec,
    signal?: AbortSignal
  ): Promise<ResolvedPackage> {
    let resolved: ResolvedPackage;
    try {
      resolved = await this.resolver.resolve(pkg, signal);
    } catch (error) {
      throw new Error(`resolve package ${pkg.name}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const { templatePath, template } = this.loadTemplate(resolved.name);

    const out = path.join(this.outputDir, resolved.name + ".mdx");
    try {
      this.printer.writeFile(out, () =>
        renderTemplate(template, resolved, templatePath)
      );
    } catch (error) {
      throw new Error(`write output for ${resolved.name}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!this.printer.dryRun) {
      this.printer.info(
        `Writing include snippets for \`${resolved.name}\` (${resolved.packageName}) version ${resolved.version}`
      );
    }

    return resolved;
  }

  private loadTemplate(name: string): { templatePath: string; template: string } {
    try {
      const templatePath = this.findTemplate(name);
      return { templatePath, template: fs.readFileSync(templatePath, "utf8") };
    } catch (error) {
      throw new Error(`load template for ${name}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private readDataFile(): PackageSpec[] {
    const content = fs.readFileSync(this.dataPath, "utf8");
    return parseDataFile(content, this.dataPath);
  }

  private validateOptions(): void {
    if (!fs.existsSync(this.dataPath)) {
      throw new Error(`data file "${this.dataPath}" not found`);
    }
    if (fs.statSync(this.dataPath).isDirectory()) {
      throw new Error(`data file "${this.dataPath}" is a directory`);
    }

    if (!fs.existsSync(this.templateDir)) {
      throw new Error(`template directory "${this.templateDir}" not found`);
    }
    if (!fs.statSync(this.templateDir).isDirectory()) {
      throw new Error(`template directory "${this.templateDir}" is not a directory`);
    }

    if (
      fs.existsSync(this.outputDir) &&
      !fs.statSync(this.outputDir).isDirectory()
    ) {
      throw new Error(`output directory "${this.outputDir}" is not a directory`);
    }
  }
}

// CLI usage
if (require.main === module) {
  const args = process.argv.slice(2);
  const [dataPath, templateDir, outputDir] = args.filter(
    (arg) => !arg.startsWith("--")
  );
  const options: GeneratorOptions = {
    dryRun: args.includes("--dry-run"),
    quiet: args.includes("--quiet"),
    verbose: args.includes("--verbose"),
  };

  try {
    const generator = new CdnSnippetGenerator(
      dataPath,
      templateDir,
      outputDir,
      options
    );
    generator
      .generateSnippets()
      .then(() => {
        if (!options.quiet) {
          console.log("✅ CDN snippets generated successfully!");
        }
      })
      .catch((error) => {
        console.error("❌ Snippet generation failed:", error);
        process.exit(1);
      });
  } catch (error) {
    console.error("❌ Snippet generation failed:", error);
    process.exit(1);
  }
}
