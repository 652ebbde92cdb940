import { existsSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { parseArgs } from "node:util";
import { CONFIG_FILENAME, findConfig, loadConfig, type FileConfig } from "./config";
import { createLogger } from "./log";
import { BUILT_IN_TEMPLATES, loadTemplate } from "./render/templates";
import type { SiteOptions } from "./site";

export const HELP = `
jotsite - Build a static HTML site from djot and markdown documents

USAGE:
  jotsite [options]
  jotsite <directory> [options]
  jotsite -f <file> [options]

ARGUMENTS:
  <directory>              Directory to generate the site from
                           (if omitted, uses "source" from ${CONFIG_FILENAME})

OPTIONS:
  -f, --file <file>        Process a single document instead of a directory
  -o, --output <path>      Output directory (default: ./output, or . with -f)
      --clean              Remove the output directory before generating
      --web-prefix <str>   Prefix for every generated internal link
  -t, --template <name>    Force a template for every page: a built-in
                           (${Object.keys(BUILT_IN_TEMPLATES).join(", ")}) or a path to an HTML file
      --strict             Treat warnings as errors
      --no-highlight       Disable syntax highlighting of code blocks
  -c, --config <file>      Path to config file (default: find ${CONFIG_FILENAME})
  -v, --verbose            Print debug output
  -h, --help               Show this help message

CONFIG FILE (${CONFIG_FILENAME}):
  {
    "source": "./docs",
    "output": "./public",
    "webPrefix": "/docs/",
    "template": "default",
    "strict": true
  }

EXAMPLES:
  jotsite ./docs                      # Build ./docs into ./output
  jotsite ./docs -o public --clean    # Rebuild into ./public
  jotsite -f notes.dj -t minimal      # Render one document
`;

export type CliCommand =
  | { type: "help" }
  | { type: "build"; options: SiteOptions };

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Turn command line arguments (and any config file) into site options
 */
export async function resolveCommand(
  args: string[],
  cwd: string
): Promise<CliCommand> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      file: { type: "string", short: "f" },
      output: { type: "string", short: "o" },
      clean: { type: "boolean" },
      "web-prefix": { type: "string" },
      template: { type: "string", short: "t" },
      strict: { type: "boolean" },
      "no-highlight": { type: "boolean" },
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    return { type: "help" };
  }

  if (positionals.length > 1) {
    throw new Error(`Expected one directory, got ${positionals.length}`);
  }

  const configPath = values.config
    ? resolve(cwd, values.config)
    : findConfig(cwd);
  if (configPath && !existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const config: FileConfig = configPath ? loadConfig(configPath) : {};

  const directory = positionals[0]
    ? resolve(cwd, positionals[0])
    : values.file
      ? undefined
      : config.source;
  const file = values.file ? resolve(cwd, values.file) : undefined;
  const clean = values.clean ?? config.clean ?? false;

  let source: string;
  let defaultOutput: string;
  if (directory && file) {
    throw new Error(
      `Cannot specify both a directory and a path! (Specified ${directory} and -f ${file})`
    );
  } else if (directory) {
    if (!existsSync(directory)) {
      throw new Error(`Path does not exist: ${directory}`);
    }
    if (!isDirectory(directory)) {
      throw new Error(
        `Path ${directory} is a file. Specify -f <FILE> if this was intended.`
      );
    }
    source = directory;
    defaultOutput = join(cwd, "output");
  } else if (file) {
    if (values.clean) {
      throw new Error("--clean cannot be combined with -f");
    }
    if (!existsSync(file)) {
      throw new Error(`Path does not exist: ${file}`);
    }
    if (isDirectory(file)) {
      throw new Error(
        `Path ${file} is a directory. Specify <DIRECTORY> without -f if this was intended.`
      );
    }
    source = file;
    defaultOutput = cwd;
  } else {
    throw new Error(
      "Must specify either a directory <DIRECTORY> or a path with -f <PATH>"
    );
  }

  // CLI args override config values
  const output = values.output
    ? resolve(cwd, values.output)
    : (config.output ?? defaultOutput);
  const templateName = values.template ?? config.template;

  return {
    type: "build",
    options: {
      source,
      output,
      clean,
      linkPrefix: values["web-prefix"] ?? config.webPrefix ?? "",
      template: templateName ? await loadTemplate(templateName, cwd) : null,
      strict: values.strict ?? config.strict ?? false,
      highlight: values["no-highlight"] ? false : (config.highlight ?? true),
      logger: createLogger(values.verbose ? "debug" : "info"),
    },
  };
}
