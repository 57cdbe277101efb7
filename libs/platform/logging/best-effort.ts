type BestEffortContext = Readonly<Record<string, unknown>>;

type BestEffortLogger = Readonly<{
  error(payload: Record<string, unknown>, message: string): void;
}>;

type RunBestEffortInput = Readonly<{
  logger: BestEffortLogger;
  operation: string;
  run: () => unknown;
  context?: BestEffortContext;
}>;

/**
 * Runs a side effect whose failure must not change the caller's outcome (audit writes, event
 * subscribers). Failures are logged with the operation name and context.
 *
 * @returns whether the side effect completed.
 */
export async function runBestEffort(input: RunBestEffortInput): Promise<boolean> {
  try {
    await input.run();
    return true;
  } catch (error: unknown) {
    input.logger.error(
      {
        err: error,
        operation: input.operation,
        ...(input.context ?? {}),
      },
      'Best-effort side effect failed',
    );
    return false;
  }
}
