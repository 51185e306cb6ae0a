import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import jwtConfig from '../../../config/jwt.config';
import { UsersService } from '../../users/users.service';
import { User } from '../../users/entities/user.entity';
import { TokenService } from './token.service';
import { LoginDto } from '../dto/login.dto';
import { TokenResponseDto } from '../dto/token-response.dto';
import { AUTH_ERRORS, BEARER_TOKEN_TYPE } from '../constants/auth.constants';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly tokenService: TokenService,
    @Inject(jwtConfig.KEY)
    private readonly config: ConfigType<typeof jwtConfig>,
  ) {}

  async validateUser(username: string, password: string): Promise<User> {
    // compare even when the username is unknown
    const passwordMatches = await this.usersService.validatePassword(username, password);
    const user = await this.usersService.findByUsername(username);

    if (!user || !passwordMatches) {
      this.logger.warn(`Failed login for ${username}`);
      throw new BadRequestException(AUTH_ERRORS.INCORRECT_LOGIN);
    }

    return user;
  }

  async login(loginDto: LoginDto): Promise<TokenResponseDto> {
    const user = await this.validateUser(loginDto.username, loginDto.password);
    const accessToken = this.tokenService.issue(
      { sub: user.username },
      this.config.accessTokenExpiry,
    );

    return new TokenResponseDto(accessToken, BEARER_TOKEN_TYPE);
  }
}
