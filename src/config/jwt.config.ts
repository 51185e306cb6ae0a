import { registerAs } from '@nestjs/config';
import type { Algorithm } from 'jsonwebtoken';

export type JwtAlgorithm = Extract<Algorithm, 'HS256' | 'HS384' | 'HS512'>;

export const JWT_ALGORITHMS: readonly JwtAlgorithm[] = ['HS256', 'HS384', 'HS512'];

const isJwtAlgorithm = (value: string): value is JwtAlgorithm =>
  JWT_ALGORITHMS.some((algorithm) => algorithm === value);

export default registerAs('jwt', () => {
  const configured = process.env.JWT_ALGORITHM ?? 'HS256';
  if (!isJwtAlgorithm(configured)) {
    throw new Error(
      `Unsupported JWT_ALGORITHM "${configured}": expected one of ${JWT_ALGORITHMS.join(', ')}`,
    );
  }
  const algorithm: JwtAlgorithm = configured;

  return {
    secret: process.env.JWT_SECRET ?? '',
    algorithm,
    accessTokenExpiry: process.env.JWT_ACCESS_TOKEN_EXPIRATION || '30m',
  };
});
