import { logger } from "./logger.ts";
import { type PathPlatform, platformFor } from "./segments/platform.ts";
import type { EnvironmentProbe, GetwdResult } from "./segments/types.ts";

export interface NodeEnvironmentOptions {
  cwd?: () => string;
  env?: NodeJS.ProcessEnv;
  platform?: PathPlatform;
}

/**
 * EnvironmentProbe backed by the running Node.js process.
 */
export class NodeEnvironment implements EnvironmentProbe {
  private readonly cwd: () => string;
  private readonly env: NodeJS.ProcessEnv;
  readonly platform: PathPlatform;

  constructor(options: NodeEnvironmentOptions = {}) {
    this.cwd = options.cwd ?? (() => process.cwd());
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? platformFor(process.platform);
  }

  getwd(): GetwdResult {
    try {
      return { ok: true, dir: this.cwd() };
    } catch (error) {
      // process.cwd() throws when the directory was removed underneath the
      // shell.
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ err }, "Unable to read the working directory");
      return { ok: false, error: err };
    }
  }

  getPathSeparator(): string {
    return this.platform.separator;
  }

  getenv(name: string): string {
    return this.env[name] ?? "";
  }

  getVolumeName(path: string): string {
    return this.platform.volumeName(path);
  }
}
