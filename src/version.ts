import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(relativePath: string): string | undefined {
  try {
    const pkgPath = fileURLToPath(new URL(relativePath, import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * - Dev mode: tsx/vitest execute src/version.ts, package.json is one level up
 * - Prod mode: node dist/src/version.js, package.json is two levels up
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  readPackageVersion("../package.json") ??
  readPackageVersion("../../package.json") ??
  "0.0.0";
