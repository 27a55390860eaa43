export type ShutdownSignal = "SIGINT" | "SIGTERM";

export type RuntimeEnv = {
  log: typeof console.log;
  error: typeof console.error;
  exit: (code: number) => never;
  /** Resolves with the first SIGINT/SIGTERM the process receives. */
  waitForShutdown: () => Promise<ShutdownSignal>;
};

function waitForProcessSignal(): Promise<ShutdownSignal> {
  return new Promise((resolve) => {
    const onInt = () => settle("SIGINT");
    const onTerm = () => settle("SIGTERM");
    const settle = (signal: ShutdownSignal) => {
      process.off("SIGINT", onInt);
      process.off("SIGTERM", onTerm);
      resolve(signal);
    };
    process.on("SIGINT", onInt);
    process.on("SIGTERM", onTerm);
  });
}

export const defaultRuntime: RuntimeEnv = {
  log: (...args: Parameters<typeof console.log>) => {
    console.log(...args);
  },
  error: (...args: Parameters<typeof console.error>) => {
    console.error(...args);
  },
  exit: (code) => {
    process.exit(code);
    throw new Error("unreachable"); // satisfies tests when mocked
  },
  waitForShutdown: waitForProcessSignal,
};
