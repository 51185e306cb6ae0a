import { parseSeedUsers } from '../src/config/auth.config';
import jwtConfig from '../src/config/jwt.config';
import { validate } from '../src/config/env.validation';
import { parseDurationToSeconds } from '../src/common/utils/time.util';

describe('configuration', () => {
  describe('validate', () => {
    const base = { JWT_SECRET: 'test-secret' };

    it('should accept a minimal environment', () => {
      const env = validate({ ...base, PATH: '/usr/bin' });

      expect(env.JWT_SECRET).toBe('test-secret');
    });

    it('should convert numeric variables', () => {
      const env = validate({ ...base, PORT: '8080', BCRYPT_ROUNDS: '12' });

      expect(env.PORT).toBe(8080);
      expect(env.BCRYPT_ROUNDS).toBe(12);
    });

    it('should require a signing secret', () => {
      expect(() => validate({})).toThrow('Invalid environment configuration');
    });

    it('should reject a short signing secret', () => {
      expect(() => validate({ JWT_SECRET: 'short' })).toThrow(
        'JWT_SECRET must be longer than or equal to 8 characters',
      );
    });

    it('should reject an asymmetric algorithm', () => {
      expect(() => validate({ ...base, JWT_ALGORITHM: 'RS256' })).toThrow('JWT_ALGORITHM');
    });

    it('should reject an unparseable token lifetime', () => {
      expect(() => validate({ ...base, JWT_ACCESS_TOKEN_EXPIRATION: 'half an hour' })).toThrow(
        'JWT_ACCESS_TOKEN_EXPIRATION must be a positive duration such as 900s, 30m, 12h, 7d or 2w',
      );
    });

    it.each(['0s', '-5m', '00m'])('should reject a non-positive token lifetime %p', (lifetime) => {
      expect(() => validate({ ...base, JWT_ACCESS_TOKEN_EXPIRATION: lifetime })).toThrow(
        'JWT_ACCESS_TOKEN_EXPIRATION must be a positive duration',
      );
    });

    it('should accept a positive token lifetime', () => {
      const env = validate({ ...base, JWT_ACCESS_TOKEN_EXPIRATION: '30m' });

      expect(env.JWT_ACCESS_TOKEN_EXPIRATION).toBe('30m');
    });

    it('should reject a bcrypt cost outside 4-15', () => {
      expect(() => validate({ ...base, BCRYPT_ROUNDS: '3' })).toThrow('BCRYPT_ROUNDS');
    });
  });

  describe('jwt namespace', () => {
    const saved = { ...process.env };

    afterEach(() => {
      process.env = { ...saved };
    });

    it('should read the secret, algorithm and lifetime from the environment', () => {
      process.env.JWT_SECRET = 'another-test-secret';
      process.env.JWT_ALGORITHM = 'HS512';
      process.env.JWT_ACCESS_TOKEN_EXPIRATION = '15m';

      expect(jwtConfig()).toEqual({
        secret: 'another-test-secret',
        algorithm: 'HS512',
        accessTokenExpiry: '15m',
      });
    });

    it('should default to HS256 and 30 minutes', () => {
      delete process.env.JWT_ALGORITHM;
      delete process.env.JWT_ACCESS_TOKEN_EXPIRATION;

      expect(jwtConfig()).toMatchObject({ algorithm: 'HS256', accessTokenExpiry: '30m' });
    });

    it('should refuse an algorithm outside the HMAC family', () => {
      process.env.JWT_ALGORITHM = 'RS256';

      expect(() => jwtConfig()).toThrow(
        'Unsupported JWT_ALGORITHM "RS256": expected one of HS256, HS384, HS512',
      );
    });
  });

  describe('parseSeedUsers', () => {
    it('should return no users for an empty value', () => {
      expect(parseSeedUsers(undefined)).toEqual([]);
      expect(parseSeedUsers('  ')).toEqual([]);
    });

    it('should split entries on the first colon only', () => {
      expect(parseSeedUsers('alice:wonderland, bob:pa:ss')).toEqual([
        { username: 'alice', password: 'wonderland' },
        { username: 'bob', password: 'pa:ss' },
      ]);
    });

    it('should reject an entry without a password', () => {
      expect(() => parseSeedUsers('alice')).toThrow(
        'Invalid AUTH_USERS entry "alice": expected username:password',
      );
    });

    it('should reject an entry without a username', () => {
      expect(() => parseSeedUsers(':secret')).toThrow('Invalid AUTH_USERS entry ":secret"');
    });
  });

  describe('parseDurationToSeconds', () => {
    it.each([
      ['45s', 45],
      ['30m', 1800],
      ['12h', 43200],
      ['7d', 604800],
      ['2w', 1209600],
      ['-5m', -300],
    ])('should parse %s as %i seconds', (input, expected) => {
      expect(parseDurationToSeconds(input)).toBe(expected);
    });

    it('should pass whole seconds through', () => {
      expect(parseDurationToSeconds(90)).toBe(90);
      expect(parseDurationToSeconds(90.7)).toBe(90);
    });

    it.each(['', '30', 'm', '1y', '1.5h'])('should reject %p', (input) => {
      expect(() => parseDurationToSeconds(input)).toThrow('Invalid duration');
    });

    it('should reject a non-finite number', () => {
      expect(() => parseDurationToSeconds(Infinity)).toThrow('Invalid duration: Infinity');
    });
  });
});
