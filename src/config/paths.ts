import path from "node:path";
import { expandHomePrefix, resolveRequiredHomeDir } from "../infra/home-dir.js";

export const STATE_DIRNAME = ".meshrelay";
export const CONFIG_FILENAME = "meshrelay.json5";

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.MESHRELAY_STATE_DIR?.trim();
  if (override) {
    return path.resolve(expandHomePrefix(override, { env }));
  }
  return path.join(resolveRequiredHomeDir(env), STATE_DIRNAME);
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.MESHRELAY_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(expandHomePrefix(override, { env }));
  }
  return path.join(resolveStateDir(env), CONFIG_FILENAME);
}

/** Resolves a state file: absolute and `~` paths as given, bare names under the state dir. */
export function resolveStateFile(
  value: string | undefined,
  fallbackName: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    return path.join(resolveStateDir(env), fallbackName);
  }
  const expanded = expandHomePrefix(trimmed, { env });
  return path.isAbsolute(expanded) ? expanded : path.join(resolveStateDir(env), expanded);
}
