import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "meshrelay";
const MAX_PARENT_DEPTH = 4;

function readPackageVersion(file: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== "object") {
    return null;
  }
  const name: unknown = Reflect.get(parsed, "name");
  const version: unknown = Reflect.get(parsed, "version");
  return name === PACKAGE_NAME && typeof version === "string" && version ? version : null;
}

/** Walks up from the module (src/ or dist/ nesting) to our own package.json. */
export function readVersionFromPackageJsonForModuleUrl(moduleUrl: string): string | null {
  let dir = path.dirname(fileURLToPath(moduleUrl));
  for (let depth = 0; depth <= MAX_PARENT_DEPTH; depth += 1) {
    const version = readPackageVersion(path.join(dir, "package.json"));
    if (version) {
      return version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export const VERSION = readVersionFromPackageJsonForModuleUrl(import.meta.url) ?? "0.0.0";
