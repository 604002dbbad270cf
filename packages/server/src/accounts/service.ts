import { randomUUID } from 'node:crypto';
import bcrypt from 'bcryptjs';
import {
  parseSignInRequest,
  parseSignUpRequest,
  type AuthTokenResponse,
  type SignUpResponse,
} from '@owned-tasks/protocol';
import { DEFAULT_TOKEN_TTL_SECONDS, signAccessToken } from '../auth';
import { TaskApiError, runStoreOperation, unwrapPayload } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { UserRecord, UserStore } from './store';

export interface AccountServiceOptions {
  users: UserStore;
  /** HS256 secret shared with the identity verifier */
  secret: string;
  logger?: Logger;
  /** bcrypt cost factor; defaults to 10 */
  hashRounds?: number;
  tokenTtlSeconds?: number;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * AccountService - sign-up and sign-in
 *
 * Passwords are stored as bcrypt hashes. Sign-in answers an unknown email
 * and a wrong password with the same INVALID_CREDENTIALS error.
 */
export class AccountService {
  private users: UserStore;
  private secret: string;
  private logger: Logger;
  private hashRounds: number;
  private tokenTtlSeconds: number;
  private now: () => Date;
  private generateId: () => string;

  constructor(options: AccountServiceOptions) {
    this.users = options.users;
    this.secret = options.secret;
    this.logger = options.logger ?? silentLogger;
    this.hashRounds = options.hashRounds ?? 10;
    this.tokenTtlSeconds = options.tokenTtlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async signUp(payload: unknown): Promise<SignUpResponse> {
    const input = unwrapPayload(parseSignUpRequest(payload));

    const user: UserRecord = {
      id: this.generateId(),
      email: input.email,
      name: input.name,
      passwordHash: await bcrypt.hash(input.password, this.hashRounds),
      createdAt: this.now().toISOString(),
    };

    const inserted = await runStoreOperation(this.logger, 'user insert', () => this.users.insert(user));
    if (!inserted) {
      throw new TaskApiError('DUPLICATE_EMAIL');
    }

    this.logger.info('Account created', { userId: user.id });
    return { message: 'User created successfully', userId: user.id };
  }

  async signIn(payload: unknown): Promise<AuthTokenResponse> {
    const input = unwrapPayload(parseSignInRequest(payload));

    const user = await runStoreOperation(this.logger, 'user lookup', () => this.users.findByEmail(input.email));
    if (!user || !(await bcrypt.compare(input.password, user.passwordHash))) {
      this.logger.debug('Sign-in rejected');
      throw new TaskApiError('INVALID_CREDENTIALS');
    }

    const accessToken = signAccessToken(
      this.secret,
      { userId: user.id, email: user.email, name: user.name },
      { ttlSeconds: this.tokenTtlSeconds, now: this.now() }
    );

    return {
      access_token: accessToken,
      token_type: 'bearer',
      user: { id: user.id, email: user.email, name: user.name },
    };
  }
}
