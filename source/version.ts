import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export function getPackageVersion(fallback = "version unavailable"): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const parsed: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string" &&
      parsed.version.length > 0
    ) {
      return parsed.version;
    }
  } catch {
    // fall through to the npm-provided version
  }
  const envV = process.env["npm_package_version"];
  if (typeof envV === "string" && envV.length > 0) {
    return envV;
  }
  return fallback;
}
