import { existsSync, readFileSync } from "node:fs";

const PACKAGE_JSON = new URL("../package.json", import.meta.url);

/**
 * Package version, read from the package.json beside the sources.
 * Builds that do not ship it report a dev marker.
 */
function readVersion(): string {
  if (!existsSync(PACKAGE_JSON)) {
    return "0.0.0-dev";
  }
  const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0-dev";
}

export const version = readVersion();
