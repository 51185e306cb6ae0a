import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AuthModule } from './modules/auth/auth.module';
import { UsersModule } from './modules/users/users.module';
import appConfig from './config/app.config';
import authConfig from './config/auth.config';
import jwtConfig from './config/jwt.config';
import { validate } from './config/env.validation';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, jwtConfig, authConfig],
      validate,
    }),

    // Feature modules
    UsersModule,
    AuthModule,
  ],
})
export class AppModule {}
