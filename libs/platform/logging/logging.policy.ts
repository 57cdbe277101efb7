import { NodeEnv } from '../config/env.enums';
import { LogLevel } from '../config/log-level';

export type LoggingRole = 'api' | 'cli';

export function defaultLogLevel(nodeEnv: NodeEnv, role: LoggingRole = 'api'): LogLevel {
  if (nodeEnv === NodeEnv.Test) return LogLevel.Silent;
  // Operator commands print their own result; only problems should reach the log stream.
  if (role === 'cli') return LogLevel.Warn;
  if (nodeEnv === NodeEnv.Development) return LogLevel.Debug;
  return LogLevel.Info;
}

export function resolveLogLevel(
  nodeEnv: NodeEnv,
  configured: LogLevel | undefined,
  role: LoggingRole = 'api',
): LogLevel {
  return configured ?? defaultLogLevel(nodeEnv, role);
}

export function isPrettyLogsEnabled(nodeEnv: NodeEnv, configured: boolean | undefined): boolean {
  if (nodeEnv !== NodeEnv.Development) return false;
  return configured !== false;
}
