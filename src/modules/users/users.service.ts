import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import authConfig from '../../config/auth.config';
import { User } from './entities/user.entity';

/**
 * In-memory credential store. Seed users from `AUTH_USERS` are hashed on module init;
 * plaintext passwords are never kept.
 */
@Injectable()
export class UsersService implements OnModuleInit {
  private readonly logger = new Logger(UsersService.name);
  private readonly users = new Map<string, User>();
  // compared against when the username is unknown
  private dummyHash: Promise<string> | null = null;

  constructor(
    @Inject(authConfig.KEY)
    private readonly config: ConfigType<typeof authConfig>,
  ) {}

  async onModuleInit(): Promise<void> {
    for (const seed of this.config.users) {
      await this.create(seed.username, seed.password);
    }
    await this.getDummyHash();
    this.logger.log(`Loaded ${this.users.size} user(s)`);
  }

  async create(username: string, password: string): Promise<User> {
    const passwordHash = await bcrypt.hash(password, this.config.bcryptRounds);
    const user = new User(username, passwordHash);
    this.users.set(username, user);
    return user;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.users.get(username) ?? null;
  }

  async validatePassword(username: string, password: string): Promise<boolean> {
    const user = await this.findByUsername(username);

    try {
      if (!user) {
        await bcrypt.compare(password, await this.getDummyHash());
        return false;
      }
      return await bcrypt.compare(password, user.passwordHash);
    } catch (error) {
      this.logger.error(
        `Error validating password for ${username}`,
        error instanceof Error ? error.stack : String(error),
      );
      return false;
    }
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= bcrypt.hash('timing-equaliser', this.config.bcryptRounds);
    return this.dummyHash;
  }
}
