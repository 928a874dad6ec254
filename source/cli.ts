import { parseArgs } from "node:util";
import { ConfigManager } from "./config.ts";
import { NodeEnvironment } from "./environment.ts";
import { handleError, PromptPathError } from "./errors.ts";
import { logger } from "./logger.ts";
import { PathSegment } from "./segments/path.ts";
import type { EnvironmentProbe } from "./segments/types.ts";
import { getPackageVersion } from "./version.ts";

export const helpText = `
Usage
  $ prompt-path

Prints the working directory formatted for a shell prompt.

Options
  --style, -s        Overrides the configured style
                     (agnoster, short, full, folder)

  --help, -h         Show help
  --version, -v      Show version

Configuration
  ~/.prompt-path/prompt-path.json, then ./.prompt-path/prompt-path.json
  PROMPT_PATH_STYLE overrides the configured style

Examples
  $ prompt-path --style short
  $ PROMPT_PATH_STYLE=folder prompt-path
`;

interface CliOptions {
  args: string[];
  environment?: EnvironmentProbe;
  home?: string;
  configEnv?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  stderr?: (line: string) => void;
}

export class Cli {
  private options: CliOptions;

  constructor(options: CliOptions) {
    this.options = options;
  }

  /** Resolves to the process exit code. */
  async run(): Promise<number> {
    const stdout =
      this.options.stdout ?? ((text: string) => process.stdout.write(text));
    const stderr = this.options.stderr;

    try {
      const flags = this.parseFlags();
      if (flags.help) {
        stdout(helpText);
        return 0;
      }
      if (flags.version) {
        stdout(`${getPackageVersion()}\n`);
        return 0;
      }

      const environment = this.options.environment ?? new NodeEnvironment();
      const cwd = environment.getwd();
      const configManager = new ConfigManager({
        cwd: cwd.ok ? cwd.dir : null,
        home: this.options.home,
        env: this.options.configEnv,
      });

      let properties = await configManager.readProperties();
      if (flags.style) {
        properties = properties.with({ style: flags.style });
      }

      const segment = new PathSegment();
      segment.init(properties, environment);
      stdout(`${segment.enabled() ? segment.render() : ""}\n`);
      return 0;
    } catch (error) {
      logger.error({ err: error }, "prompt-path failed");
      handleError(error, stderr);
      return 1;
    }
  }

  private parseFlags() {
    try {
      const { values } = parseArgs({
        args: this.options.args,
        options: {
          style: { type: "string", short: "s" },
          help: { type: "boolean", short: "h", default: false },
          version: { type: "boolean", short: "v", default: false },
        },
        allowPositionals: false,
      });
      return values;
    } catch (error) {
      throw new PromptPathError(
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    }
  }
}
