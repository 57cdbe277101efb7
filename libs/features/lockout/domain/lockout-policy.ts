export type LockoutPolicy = Readonly<{
  /** Failures within the cooloff window that lock a scope. */
  failureLimit: number;
  cooloffMs: number;
  lockoutByCombinationUserAndIp: boolean;
  useUserAgent: boolean;
  onlyUserFailures: boolean;
}>;

export type LockoutPolicyInput = Readonly<{
  failureLimit: number;
  cooloffSeconds: number;
  lockoutByCombinationUserAndIp?: boolean;
  useUserAgent?: boolean;
  onlyUserFailures?: boolean;
}>;

export class LockoutConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockoutConfigurationError';
  }
}

export function createLockoutPolicy(input: LockoutPolicyInput): LockoutPolicy {
  if (!Number.isInteger(input.failureLimit) || input.failureLimit < 1) {
    throw new LockoutConfigurationError(
      `failureLimit must be an integer >= 1 (got ${String(input.failureLimit)})`,
    );
  }
  if (!Number.isFinite(input.cooloffSeconds) || input.cooloffSeconds <= 0) {
    throw new LockoutConfigurationError(
      `cooloffSeconds must be a positive number (got ${String(input.cooloffSeconds)})`,
    );
  }

  const policy: LockoutPolicy = {
    failureLimit: input.failureLimit,
    cooloffMs: Math.round(input.cooloffSeconds * 1000),
    lockoutByCombinationUserAndIp: input.lockoutByCombinationUserAndIp ?? false,
    useUserAgent: input.useUserAgent ?? false,
    onlyUserFailures: input.onlyUserFailures ?? false,
  };
  assertScopingModes(policy);
  return policy;
}

export function assertScopingModes(
  policy: Pick<LockoutPolicy, 'onlyUserFailures' | 'lockoutByCombinationUserAndIp'>,
): void {
  if (policy.onlyUserFailures && policy.lockoutByCombinationUserAndIp) {
    throw new LockoutConfigurationError(
      'onlyUserFailures and lockoutByCombinationUserAndIp cannot both be enabled',
    );
  }
}

export function cooloffSeconds(policy: Pick<LockoutPolicy, 'cooloffMs'>): number {
  return Math.max(1, Math.ceil(policy.cooloffMs / 1000));
}
