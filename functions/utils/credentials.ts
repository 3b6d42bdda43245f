import type { Credentials } from './types.js';

const USERNAME_LABEL = /^(?:username|user|email|login)\s*:\s*(.*)$/i;
const PASSWORD_LABEL = /^(?:password|pass|pwd)\s*:\s*(.*)$/i;

/**
 * Parses the credential field of a case.
 *
 * Accepts labelled lines ("Email: x" / "Password: y") or the plain
 * `username:password` form, split on the first colon. A single line is
 * always the plain form, so `user:secret` keeps `user` as the username.
 */
export function parseCredentials(text: string | null | undefined): Credentials | undefined {
  const trimmed = text?.trim();
  if (!trimmed) return undefined;

  const lines = trimmed.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  let username: string | undefined;
  let password: string | undefined;

  for (const line of lines) {
    const userMatch = USERNAME_LABEL.exec(line);
    if (userMatch && username === undefined) {
      username = userMatch[1].trim();
      continue;
    }
    const passMatch = PASSWORD_LABEL.exec(line);
    if (passMatch && password === undefined) {
      password = passMatch[1].trim();
    }
  }

  if (lines.length > 1 && (username !== undefined || password !== undefined)) {
    return { username: username ?? '', password: password ?? '' };
  }

  const separator = trimmed.indexOf(':');
  if (separator === -1) return { username: trimmed, password: '' };

  return {
    username: trimmed.slice(0, separator).trim(),
    password: trimmed.slice(separator + 1).trim(),
  };
}

export function maskPassword(credentials: Credentials | undefined): string {
  if (!credentials) return 'none';
  return `${credentials.username} / ${'*'.repeat(credentials.password.length)}`;
}
