import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { JsonWebTokenError, JwtService, TokenExpiredError } from '@nestjs/jwt';
import jwtConfig from '../../../config/jwt.config';
import { CLOCK, Clock } from '../../../common/clock/clock';
import { Duration, parseDurationToSeconds } from '../../../common/utils/time.util';
import {
  InvalidCredentialsError,
  InvalidCredentialsReason,
} from '../errors/invalid-credentials.error';
import { ClaimsSet, IssuedClaims } from '../interfaces/token-payload.interface';

/**
 * Mints and checks HMAC-signed access tokens.
 *
 * Both operations are synchronous and read nothing but the injected config and clock,
 * so a single instance can serve any number of concurrent requests.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(jwtConfig.KEY)
    private readonly config: ConfigType<typeof jwtConfig>,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * Signs `claims` with an `exp` of now + `ttl`. Any `exp` already present is replaced.
   * An `iat` is kept only when the caller supplies one; none is added otherwise.
   */
  issue(claims: ClaimsSet, ttl: Duration): string {
    const exp = this.nowInSeconds() + parseDurationToSeconds(ttl);
    const toEncode: IssuedClaims = { ...claims, exp };

    return this.jwtService.sign(toEncode, {
      secret: this.config.secret,
      algorithm: this.config.algorithm,
      noTimestamp: !('iat' in claims),
    });
  }

  /** Returns the embedded claims, or throws {@link InvalidCredentialsError}. */
  verify(token: string): IssuedClaims {
    let payload: ClaimsSet;
    try {
      payload = this.jwtService.verify<ClaimsSet>(token, {
        secret: this.config.secret,
        algorithms: [this.config.algorithm],
        clockTimestamp: this.nowInSeconds(),
      });
    } catch (error) {
      const reason = this.reasonFor(error);
      this.logger.debug(`Token rejected: ${reason}`);
      throw new InvalidCredentialsError(reason, { cause: error });
    }

    // jsonwebtoken only checks exp when present; issued tokens always carry one
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new InvalidCredentialsError('malformed');
    }
    const { exp, ...claims } = payload;
    if (typeof exp !== 'number') {
      this.logger.debug('Token rejected: missing exp');
      throw new InvalidCredentialsError('malformed');
    }

    return { ...claims, exp };
  }

  private nowInSeconds(): number {
    return Math.floor(this.clock.now() / 1000);
  }

  private reasonFor(error: unknown): InvalidCredentialsReason {
    if (error instanceof TokenExpiredError) {
      return 'expired';
    }
    if (error instanceof JsonWebTokenError) {
      switch (error.message) {
        case 'invalid signature':
          return 'signature';
        case 'invalid algorithm':
          return 'algorithm';
      }
    }
    return 'malformed';
  }
}
