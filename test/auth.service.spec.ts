import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import jwtConfig from '../src/config/jwt.config';
import { AuthService } from '../src/modules/auth/services/auth.service';
import { TokenService } from '../src/modules/auth/services/token.service';
import { UsersService } from '../src/modules/users/users.service';
import { User } from '../src/modules/users/entities/user.entity';
import { ManualClock, T0_SECONDS, createTokenService } from './test-utils';

describe('AuthService', () => {
  let authService: AuthService;
  let tokenService: TokenService;
  const usersService = {
    findByUsername: jest.fn<Promise<User | null>, [string]>(),
    validatePassword: jest.fn<Promise<boolean>, [string, string]>(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    tokenService = createTokenService(new ManualClock());

    const module = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: UsersService, useValue: usersService },
        { provide: TokenService, useValue: tokenService },
        {
          provide: jwtConfig.KEY,
          useValue: { secret: 'test-secret', algorithm: 'HS256', accessTokenExpiry: '30m' },
        },
      ],
    }).compile();

    authService = module.get<AuthService>(AuthService);
  });

  describe('login', () => {
    it('should issue a bearer token for valid credentials', async () => {
      usersService.findByUsername.mockResolvedValue(new User('alice', 'hash'));
      usersService.validatePassword.mockResolvedValue(true);

      const response = await authService.login({ username: 'alice', password: 'wonderland' });

      expect(response.token_type).toBe('bearer');
      expect(tokenService.verify(response.access_token)).toEqual({
        sub: 'alice',
        exp: T0_SECONDS + 30 * 60,
      });
      expect(usersService.validatePassword).toHaveBeenCalledWith('alice', 'wonderland');
    });

    it('should reject a wrong password with a 400', async () => {
      usersService.findByUsername.mockResolvedValue(new User('alice', 'hash'));
      usersService.validatePassword.mockResolvedValue(false);

      await expect(
        authService.login({ username: 'alice', password: 'nope' }),
      ).rejects.toThrow(new BadRequestException('Incorrect username or password'));
    });

    it('should still compare a password for an unknown user', async () => {
      usersService.findByUsername.mockResolvedValue(null);
      usersService.validatePassword.mockResolvedValue(false);

      await expect(
        authService.login({ username: 'nobody', password: 'nope' }),
      ).rejects.toThrow(new BadRequestException('Incorrect username or password'));
      expect(usersService.validatePassword).toHaveBeenCalledWith('nobody', 'nope');
    });
  });
});
