/**
 * Path segment: renders the working directory for a shell prompt.
 *
 * Styles:
 * - `agnoster` (default): root, one folder icon per skipped folder, last folder
 * - `short`: working directory with its home, registry or provider prefix
 *   replaced
 * - `full`: working directory as is
 * - `folder`: last folder only
 *
 * @module segments/path
 */

import { base } from "./base.ts";
import {
  type EnvironmentProbe,
  isPathStyle,
  type PathStyle,
  type Property,
  type PropertyStore,
  type Segment,
} from "./types.ts";

export const HOME_ENV_VAR = "HOME";

/** Windows registry root for HKEY_CURRENT_USER. */
export const REGISTRY_ROOT = "HKCU:";

/** Prefix PowerShell puts in front of provider-qualified filesystem paths. */
export const POWERSHELL_FILESYSTEM_PROVIDER =
  "Microsoft.PowerShell.Core\\FileSystem::";

/** Stands in for the whole home directory when counting path depth. */
const HOME_PLACEHOLDER = "root";

const DEFAULT_HOME_ICON = "~";
const DEFAULT_FOLDER_ICON = "..";
const DEFAULT_REGISTRY_ICON = "HK:";

export class PathSegment implements Segment {
  private props: PropertyStore | null = null;
  private env: EnvironmentProbe | null = null;

  init(props: PropertyStore, env: EnvironmentProbe): void {
    this.props = props;
    this.env = env;
  }

  enabled(): boolean {
    return true;
  }

  render(): string {
    if (!this.props || !this.env) {
      return "";
    }
    const style = this.props.getString("style", "agnoster");
    if (!isPathStyle(style)) {
      return `Path style: ${style} is not available`;
    }
    return this.renderStyle(style);
  }

  private renderStyle(style: PathStyle): string {
    switch (style) {
      case "agnoster":
        return this.agnosterPath();
      case "short":
        return this.shortPath();
      case "full":
        return this.workingDir();
      case "folder":
        return base(this.workingDir(), this.probe());
    }
  }

  private shortPath(): string {
    const pwd = this.workingDir();
    // First match wins; the order is part of the contract.
    const mappedLocations: [string, string][] = [
      [
        REGISTRY_ROOT,
        this.property("windows_registry_icon", DEFAULT_REGISTRY_ICON),
      ],
      [POWERSHELL_FILESYSTEM_PROVIDER, ""],
      [this.homeDir(), this.property("home_icon", DEFAULT_HOME_ICON)],
    ];
    for (const [location, replacement] of mappedLocations) {
      if (pwd.startsWith(location)) {
        return replacement + pwd.slice(location.length);
      }
    }
    return pwd;
  }

  private agnosterPath(): string {
    const pwd = this.workingDir();
    const separator = this.property(
      "folder_separator_icon",
      this.probe().getPathSeparator(),
    );
    const folderIcon = this.property("folder_icon", DEFAULT_FOLDER_ICON);

    let result = this.rootLocation(pwd);
    const depth = this.pathDepth(pwd);
    for (let i = 1; i < depth; i++) {
      result += `${separator}${folderIcon}`;
    }
    if (depth > 0) {
      result += `${separator}${base(pwd, this.probe())}`;
    }
    return result;
  }

  /**
   * First component of `pwd`: the home icon, the registry icon or the
   * component itself (a drive letter, say).
   *
   * Like `pathDepth` and `inHomeDir`, this reads the environment and throws
   * when called before `init`.
   */
  rootLocation(pwd: string): string {
    let path = pwd;
    if (path.startsWith(POWERSHELL_FILESYSTEM_PROVIDER)) {
      path = path.slice(POWERSHELL_FILESYSTEM_PROVIDER.length);
    }
    if (this.inHomeDir(path)) {
      return this.property("home_icon", DEFAULT_HOME_ICON);
    }
    const separator = this.probe().getPathSeparator();
    if (path.startsWith(separator)) {
      path = path.slice(separator.length);
    }
    const root = path.split(separator).find((part) => part !== "") ?? "";
    if (root === REGISTRY_ROOT) {
      return this.property("windows_registry_icon", DEFAULT_REGISTRY_ICON);
    }
    return root;
  }

  /**
   * Number of folders between the root and the last folder. The home
   * directory counts as a single folder.
   */
  pathDepth(pwd: string): number {
    let path = pwd;
    if (this.inHomeDir(path)) {
      path = path.replace(this.homeDir(), HOME_PLACEHOLDER);
    }
    const parts = path
      .split(this.probe().getPathSeparator())
      .filter((part) => part !== "");
    return parts.length - 1;
  }

  // Literal prefix test: a HOME with a trailing slash does not match HOME
  // itself.
  inHomeDir(pwd: string): boolean {
    return pwd.startsWith(this.homeDir());
  }

  private workingDir(): string {
    const result = this.probe().getwd();
    return result.ok ? result.dir : "";
  }

  private homeDir(): string {
    return this.probe().getenv(HOME_ENV_VAR);
  }

  private property(key: Property, defaultValue: string): string {
    return this.props ? this.props.getString(key, defaultValue) : defaultValue;
  }

  /** @throws {Error} when called before `init`. */
  private probe(): EnvironmentProbe {
    if (!this.env) {
      throw new Error("PathSegment used before init");
    }
    return this.env;
  }
}
