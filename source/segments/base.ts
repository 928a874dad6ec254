import type { EnvironmentProbe } from "./types.ts";

/**
 * Returns the last element of `path` using the separator and volume rules of
 * the probed environment.
 *
 * Trailing separators are removed before the last element is taken. An empty
 * path yields ".", and a path made only of separators yields one separator.
 *
 * @example
 * ```typescript
 * base("/a/b/", env) // "b"
 * base("/", env)     // "/"
 * base("", env)      // "."
 * ```
 */
export function base(
  path: string,
  env: Pick<EnvironmentProbe, "getPathSeparator" | "getVolumeName">,
): string {
  if (path === "") {
    return ".";
  }
  const separator = env.getPathSeparator();

  let end = path.length;
  while (end > 0 && path[end - 1] === separator) {
    end--;
  }
  let rest = path.slice(0, end);

  rest = rest.slice(env.getVolumeName(rest).length);

  const last = rest.lastIndexOf(separator);
  if (last >= 0) {
    rest = rest.slice(last + 1);
  }

  return rest === "" ? separator : rest;
}
