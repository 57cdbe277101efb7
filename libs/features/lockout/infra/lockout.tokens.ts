export const LOCKOUT_CLOCK = Symbol('LOCKOUT_CLOCK');
export const LOCKOUT_CONFIG = Symbol('LOCKOUT_CONFIG');
export const LOCKOUT_LOGGER = Symbol('LOCKOUT_LOGGER');
export const ATTEMPT_STORE = Symbol('ATTEMPT_STORE');
export const ACCESS_LOG_REPOSITORY = Symbol('ACCESS_LOG_REPOSITORY');
export const TRUST_STORE = Symbol('TRUST_STORE');
