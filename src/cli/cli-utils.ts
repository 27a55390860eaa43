import { formatErrorMessage } from "../infra/errors.js";

export { formatErrorMessage };

export async function runCommandWithRuntime(
  runtime: { error: (message: string) => void; exit: (code: number) => void },
  action: () => Promise<void>,
  onError?: (error: unknown) => void,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (onError) {
      onError(err);
      return;
    }
    runtime.error(formatErrorMessage(err));
    runtime.exit(1);
  }
}

/** Positive integer option values; commander hands them over as strings. */
export function parsePositiveInt(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) <= 0) {
    throw new Error(`${label} must be a positive integer (got "${raw}")`);
  }
  return Number(trimmed);
}
