import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import authConfig from '../../config/auth.config';
import { UsersService } from './users.service';

@Module({
  imports: [ConfigModule.forFeature(authConfig)],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
