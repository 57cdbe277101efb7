export const USER_AGENT_MAX_LENGTH = 255;

/** What a login attempt says about who is trying and from where. Every field may be missing. */
export type LoginIdentity = Readonly<{
  username?: string | null;
  ip?: string | null;
  userAgent?: string | null;
}>;

export type NormalizedIdentity = Readonly<{
  username: string | null;
  ip: string | null;
  userAgent: string | null;
}>;

function asText(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed !== '' ? trimmed : null;
}

export function normalizeUserAgent(value: string | null | undefined): string | null {
  const text = asText(value);
  if (text === null) return null;
  if (text.length <= USER_AGENT_MAX_LENGTH) return text;

  // Counted in code points so a surrogate pair is never split.
  const codePoints = Array.from(text);
  return codePoints.length <= USER_AGENT_MAX_LENGTH
    ? text
    : codePoints.slice(0, USER_AGENT_MAX_LENGTH).join('');
}

/**
 * Blank usernames (an empty login form) count as absent, so the attempt is still scoped by ip.
 * Usernames keep their case.
 */
export function normalizeIdentity(identity: LoginIdentity): NormalizedIdentity {
  return {
    username: asText(identity.username),
    ip: asText(identity.ip),
    userAgent: normalizeUserAgent(identity.userAgent),
  };
}
