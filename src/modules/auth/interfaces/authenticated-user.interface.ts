import type { Request } from 'express';
import { IssuedClaims } from './token-payload.interface';

export interface AuthenticatedUser {
  username: string;
  claims: IssuedClaims;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}
