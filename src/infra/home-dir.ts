import os from "node:os";
import path from "node:path";

function normalize(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeSafe(homedir: () => string): string | undefined {
  try {
    return normalize(homedir());
  } catch {
    return undefined;
  }
}

export function resolveRequiredHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const raw = normalize(env.HOME) ?? normalize(env.USERPROFILE) ?? normalizeSafe(homedir);
  return raw ? path.resolve(raw) : path.resolve(process.cwd());
}

export function expandHomePrefix(
  input: string,
  opts?: { env?: NodeJS.ProcessEnv; homedir?: () => string },
): string {
  if (!input.startsWith("~")) {
    return input;
  }
  const home = resolveRequiredHomeDir(opts?.env ?? process.env, opts?.homedir ?? os.homedir);
  return input.replace(/^~(?=$|[\\/])/, home);
}
