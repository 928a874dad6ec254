/**
 * Path rules of the platforms a prompt can render on. Kept apart from the
 * host so Windows-shaped paths can be rendered (and tested) anywhere.
 */

export interface PathPlatform {
  readonly name: "posix" | "windows";
  readonly separator: string;
  volumeName(path: string): string;
}

const driveLetterPattern = /^[A-Za-z]:/;

function isSlash(ch: string | undefined): boolean {
  return ch === "\\" || ch === "/";
}

/**
 * Length of the volume prefix of a Windows path: `C:` or `\\host\share`.
 */
export function windowsVolumeNameLength(path: string): number {
  if (path.length < 2) {
    return 0;
  }
  if (driveLetterPattern.test(path)) {
    return 2;
  }
  const length = path.length;
  if (
    length >= 5 &&
    isSlash(path[0]) &&
    isSlash(path[1]) &&
    !isSlash(path[2]) &&
    path[2] !== "."
  ) {
    // \\host\share: find the end of the host, then the end of the share.
    for (let n = 3; n < length - 1; n++) {
      if (!isSlash(path[n])) {
        continue;
      }
      n++;
      if (isSlash(path[n]) || path[n] === ".") {
        break;
      }
      while (n < length && !isSlash(path[n])) {
        n++;
      }
      return n;
    }
  }
  return 0;
}

export const posixPaths: PathPlatform = {
  name: "posix",
  separator: "/",
  volumeName: () => "",
};

export const windowsPaths: PathPlatform = {
  name: "windows",
  separator: "\\",
  volumeName: (path) => path.slice(0, windowsVolumeNameLength(path)),
};

export function platformFor(platform: NodeJS.Platform): PathPlatform {
  return platform === "win32" ? windowsPaths : posixPaths;
}
