type BestEffortContext = Readonly<Record<string, unknown>>;

type BestEffortLogger = Readonly<{
  warn(payload: Record<string, unknown>, message: string): void;
}>;

type RunBestEffortInput = Readonly<{
  logger: BestEffortLogger;
  operation: string;
  run: () => Promise<unknown>;
  context?: BestEffortContext;
}>;

/** Runs a cleanup step whose failure must not change the outcome of the caller. */
export async function runBestEffort(input: RunBestEffortInput): Promise<void> {
  try {
    await input.run();
  } catch (error: unknown) {
    input.logger.warn(
      {
        err: error,
        operation: input.operation,
        ...(input.context ?? {}),
      },
      'Best-effort cleanup failed',
    );
  }
}
