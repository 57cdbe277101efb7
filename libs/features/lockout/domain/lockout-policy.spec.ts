import { cooloffSeconds, createLockoutPolicy, LockoutConfigurationError } from './lockout-policy';

describe('createLockoutPolicy', () => {
  it('fills in default scoping flags', () => {
    expect(createLockoutPolicy({ failureLimit: 3, cooloffSeconds: 3600 })).toEqual({
      failureLimit: 3,
      cooloffMs: 3_600_000,
      lockoutByCombinationUserAndIp: false,
      useUserAgent: false,
      onlyUserFailures: false,
    });
  });

  it.each([0, -1, 2.5, Number.NaN])('rejects failureLimit %p', (failureLimit) => {
    expect(() => createLockoutPolicy({ failureLimit, cooloffSeconds: 60 })).toThrow(
      LockoutConfigurationError,
    );
  });

  it.each([0, -30, Number.POSITIVE_INFINITY])('rejects cooloffSeconds %p', (value) => {
    expect(() => createLockoutPolicy({ failureLimit: 3, cooloffSeconds: value })).toThrow(
      LockoutConfigurationError,
    );
  });

  it('rejects user-only and combination scoping together', () => {
    expect(() =>
      createLockoutPolicy({
        failureLimit: 3,
        cooloffSeconds: 60,
        onlyUserFailures: true,
        lockoutByCombinationUserAndIp: true,
      }),
    ).toThrow('onlyUserFailures and lockoutByCombinationUserAndIp cannot both be enabled');
  });

  it('reports the cooloff in whole seconds', () => {
    expect(cooloffSeconds({ cooloffMs: 1500 })).toBe(2);
    expect(cooloffSeconds({ cooloffMs: 3_600_000 })).toBe(3600);
  });
});
