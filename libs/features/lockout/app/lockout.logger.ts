/** Structured logger the lockout services write to; PinoLogger satisfies it. */
export type LockoutLogger = Readonly<{
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}>;
