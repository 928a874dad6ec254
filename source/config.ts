import { mkdirSync } from "node:fs";
import fs from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { ZodIssueCode, z } from "zod";
import { ConfigError } from "./errors.ts";
import { Properties, type PropertyValues } from "./segments/properties.ts";
import { PROPERTY_KEYS, type Property } from "./segments/types.ts";

export const CONFIG_FILE_NAME = "prompt-path.json";
export const CONFIG_DIR_NAME = ".prompt-path";
export const STYLE_ENV_VAR = "PROMPT_PATH_STYLE";

const parseJsonPreprocessor = (value: unknown, ctx: z.RefinementCtx) => {
  if (typeof value === "string") {
    try {
      return JSON.parse(value);
    } catch (e) {
      ctx.addIssue({
        code: ZodIssueCode.custom,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
  return value;
};

export function jsonParser<T extends z.ZodTypeAny>(input: T) {
  return z.preprocess(parseJsonPreprocessor, input);
}

// Style is left as a free string: an unknown style renders a notice
// instead of failing the prompt.
export const PathConfigSchema = z
  .object({
    style: z.string().optional(),
    folder_separator_icon: z.string().optional(),
    home_icon: z.string().optional(),
    folder_icon: z.string().optional(),
    windows_registry_icon: z.string().optional(),
  })
  .strict();

export type PathConfig = z.infer<typeof PathConfigSchema>;

export class DirectoryProvider {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  getPath(subdir?: string): string {
    return subdir ? path.join(this.baseDir, subdir) : this.baseDir;
  }

  // For call-sites that need the directory before any await, such as the
  // logger.
  ensurePathSync(subdir?: string): string {
    const dirPath = this.getPath(subdir);
    mkdirSync(dirPath, { recursive: true });
    return dirPath;
  }
}

export function appDirectory(home: string = homedir()): DirectoryProvider {
  return new DirectoryProvider(path.join(home, CONFIG_DIR_NAME));
}

export interface ConfigManagerOptions {
  /** Project directory; `null` when unknown, which skips the project config. */
  cwd?: string | null;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  readonly project: DirectoryProvider | null;
  readonly app: DirectoryProvider;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    const cwd = options.cwd === undefined ? process.cwd() : options.cwd;
    this.project =
      cwd === null
        ? null
        : new DirectoryProvider(path.join(cwd, CONFIG_DIR_NAME));
    this.app = appDirectory(options.home);
    this.env = options.env ?? process.env;
  }

  private async _readConfig(configPath: string): Promise<PathConfig> {
    let data: string;
    try {
      data = await fs.readFile(configPath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return {};
      }
      throw new ConfigError(configPath, "unable to read file", {
        cause: error,
      });
    }
    const result = jsonParser(PathConfigSchema).safeParse(data);
    if (!result.success) {
      throw new ConfigError(configPath, formatIssues(result.error), {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * App config, then project config, then the style override from the
   * environment.
   */
  async readPathConfig(): Promise<PathConfig> {
    const appConfig = await this._readConfig(
      path.join(this.app.getPath(), CONFIG_FILE_NAME),
    );
    const projectConfig = this.project
      ? await this._readConfig(
          path.join(this.project.getPath(), CONFIG_FILE_NAME),
        )
      : {};

    const merged: PathConfig = { ...appConfig, ...projectConfig };
    const styleOverride = this.env[STYLE_ENV_VAR];
    if (styleOverride) {
      merged.style = styleOverride;
    }
    return merged;
  }

  async readProperties(): Promise<Properties> {
    return new Properties(toPropertyValues(await this.readPathConfig()));
  }

}

function toPropertyValues(config: PathConfig): PropertyValues {
  const values: PropertyValues = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined && isPropertyKey(key)) {
      values[key] = value;
    }
  }
  return values;
}

function isPropertyKey(key: string): key is Property {
  return PROPERTY_KEYS.some((property) => property === key);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}
