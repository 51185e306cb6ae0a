import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { TokenService } from '../services/token.service';
import { InvalidCredentialsError } from '../errors/invalid-credentials.error';
import { IssuedClaims, subjectOf } from '../interfaces/token-payload.interface';
import { AuthenticatedRequest } from '../interfaces/authenticated-user.interface';
import { AUTH_ERRORS } from '../constants/auth.constants';

/**
 * JwtAuthGuard
 *
 * - Expects `Authorization: Bearer <token>`.
 * - Verifies the token with TokenService and requires a string `sub` claim.
 * - Attaches `{ username, claims }` to request.user.
 *
 * Every failure, whatever its cause, is the same 401; the exception filter adds
 * the `WWW-Authenticate: Bearer` challenge.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(private readonly tokenService: TokenService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const token = this.extractTokenFromHeader(req);
    if (!token) {
      throw new UnauthorizedException(AUTH_ERRORS.INVALID_CREDENTIALS);
    }

    let claims: IssuedClaims;
    try {
      claims = this.tokenService.verify(token);
    } catch (err) {
      if (err instanceof InvalidCredentialsError) {
        this.logger.debug(`JWT verification failed: ${err.reason}`);
        throw new UnauthorizedException(AUTH_ERRORS.INVALID_CREDENTIALS);
      }
      throw err;
    }

    const username = subjectOf(claims);
    if (!username) {
      this.logger.debug('JWT verification failed: no subject');
      throw new UnauthorizedException(AUTH_ERRORS.INVALID_CREDENTIALS);
    }

    req.user = { username, claims };
    return true;
  }

  private extractTokenFromHeader(req: AuthenticatedRequest): string | null {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      return null;
    }

    const [scheme, token, ...rest] = authHeader.trim().split(/\s+/);
    if (scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
      return null;
    }
    return token;
  }
}
