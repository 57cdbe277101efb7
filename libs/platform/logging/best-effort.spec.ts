import { runBestEffort } from './best-effort';

type LoggerError = (payload: Record<string, unknown>, message: string) => void;

describe('runBestEffort', () => {
  it('executes side effect and does not log on success', async () => {
    const logger: { error: jest.MockedFunction<LoggerError> } = { error: jest.fn() };
    const run = jest.fn(async () => undefined);

    const completed = await runBestEffort({
      logger,
      operation: 'lockout.appendAccessLog',
      run,
      context: { username: 'bob' },
    });

    expect(completed).toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('accepts synchronous side effects', async () => {
    const logger: { error: jest.MockedFunction<LoggerError> } = { error: jest.fn() };
    const seen: string[] = [];

    await expect(
      runBestEffort({ logger, operation: 'lockout.notify', run: () => seen.push('called') }),
    ).resolves.toBe(true);
    expect(seen).toEqual(['called']);
  });

  it('swallows errors and logs a standardized shape', async () => {
    const logger: { error: jest.MockedFunction<LoggerError> } = { error: jest.fn() };
    const failure = new Error('sqlite busy');

    const completed = await runBestEffort({
      logger,
      operation: 'lockout.appendAccessLog',
      run: async () => {
        throw failure;
      },
      context: { username: 'bob', ipAddress: '10.0.0.1' },
    });

    expect(completed).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      {
        err: failure,
        operation: 'lockout.appendAccessLog',
        username: 'bob',
        ipAddress: '10.0.0.1',
      },
      'Best-effort side effect failed',
    );
  });

  it('catches errors thrown synchronously by the side effect', async () => {
    const logger: { error: jest.MockedFunction<LoggerError> } = { error: jest.fn() };

    await expect(
      runBestEffort({
        logger,
        operation: 'lockout.notify',
        run: () => {
          throw new Error('handler exploded');
        },
      }),
    ).resolves.toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
