import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { JWT_ALGORITHMS } from './jwt.config';
import { POSITIVE_DURATION_PATTERN } from '../common/utils/time.util';

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'test', 'production'])
  NODE_ENV?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsString()
  @IsNotEmpty()
  @MinLength(8)
  JWT_SECRET!: string;

  @IsOptional()
  @IsIn(JWT_ALGORITHMS)
  JWT_ALGORITHM?: string;

  @IsOptional()
  @Matches(POSITIVE_DURATION_PATTERN, {
    message: 'JWT_ACCESS_TOKEN_EXPIRATION must be a positive duration such as 900s, 30m, 12h, 7d or 2w',
  })
  JWT_ACCESS_TOKEN_EXPIRATION?: string;

  @IsOptional()
  @IsString()
  AUTH_USERS?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(4)
  @Max(15)
  BCRYPT_ROUNDS?: number;
}

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Throws with every failing
 * variable listed, which aborts bootstrap.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
