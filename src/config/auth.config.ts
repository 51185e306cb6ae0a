import { registerAs } from '@nestjs/config';

export interface SeedUser {
  username: string;
  password: string;
}

/**
 * Parses `AUTH_USERS` ("alice:secret,bob:hunter2") into seed users.
 * The password is everything after the first colon, so it may contain colons itself.
 */
export const parseSeedUsers = (raw: string | undefined): SeedUser[] => {
  if (!raw || !raw.trim()) return [];

  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf(':');
      const username = separator > 0 ? entry.slice(0, separator).trim() : '';
      const password = separator > 0 ? entry.slice(separator + 1) : '';

      if (!username || !password) {
        throw new Error(`Invalid AUTH_USERS entry "${entry}": expected username:password`);
      }
      return { username, password };
    });
};

export default registerAs('auth', () => ({
  users: parseSeedUsers(process.env.AUTH_USERS),
  bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '10', 10),
}));
