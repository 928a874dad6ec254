/**
 * Contracts between a prompt segment and the prompt engine that drives it.
 *
 * @module segments/types
 */

/**
 * Read-only key/value configuration. Lookups never fail: a missing key
 * yields the default passed at the call site.
 */
export interface PropertyStore {
  getString(key: Property, defaultValue: string): string;
}

export type GetwdResult =
  | { ok: true; dir: string }
  | { ok: false; error: Error };

/**
 * Everything a segment may learn about the host it renders on.
 */
export interface EnvironmentProbe {
  getwd(): GetwdResult;
  /** Single-character path separator. */
  getPathSeparator(): string;
  /** Returns "" when the variable is unset. */
  getenv(name: string): string;
  /** Leading volume name of `path` ("" where the platform has none). */
  getVolumeName(path: string): string;
}

export interface Segment {
  init(props: PropertyStore, env: EnvironmentProbe): void;
  enabled(): boolean;
  render(): string;
}

export const PROPERTY_KEYS = [
  "style",
  "folder_separator_icon",
  "home_icon",
  "folder_icon",
  "windows_registry_icon",
] as const;

export type Property = (typeof PROPERTY_KEYS)[number];

export const PATH_STYLES = ["agnoster", "short", "full", "folder"] as const;

export type PathStyle = (typeof PATH_STYLES)[number];

export function isPathStyle(value: string): value is PathStyle {
  return PATH_STYLES.some((style) => style === value);
}
