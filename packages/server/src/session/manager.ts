import type { AuthorizationRequest, SubjectType } from '@opcore/shared';
import type { ISessionStorage } from '../storage/interfaces/session-storage.js';
import type { Clock } from './clock.js';
import type { Logger } from '../logging/logger.js';
import type { TokenHandler } from '../token/handler.js';
import type {
  AuthenticationEvent,
  ClaimsRestriction,
  ClaimsUsage,
  ClientSessionRecord,
  GrantKind,
  SessionRecord,
  TokenType,
  UsageRules,
  UserSessionRecord,
} from './types.js';
import type { SessionToken } from './token.js';
import { Grant, type MintOptions } from './grant.js';
import { KeyedMutex } from './lock.js';
import { SUBJECT_DERIVERS } from './subject.js';
import { sessionKey, unpackGrantKey, unpackSessionKey, type SessionPath } from './session-key.js';
import { UnknownSession, UnknownToken } from '../errors/session-errors.js';
import { silentLogger } from '../logging/logger.js';

export interface CreateSessionInput {
  authnEvent: AuthenticationEvent;
  authRequest: AuthorizationRequest;
  userId: string;
  clientId: string;
  subType?: SubjectType;
  sectorIdentifier?: string;
  scope?: string[];
  resources?: string[];
  claims?: Partial<Record<ClaimsUsage, ClaimsRestriction>>;
  usageRules?: UsageRules;
  grantKind?: GrantKind;
}

export interface SessionInfo {
  sessionId: string;
  userId: string;
  clientId?: string;
  grantId?: string;
  userSession?: UserSessionRecord;
  clientSession?: ClientSessionRecord;
  grant?: Grant;
}

export interface SessionInfoOptions {
  user?: boolean;
  client?: boolean;
  grant?: boolean;
}

/**
 * Session info for a grant-level session id, grant loaded
 */
export interface GrantSessionInfo extends SessionInfo {
  clientId: string;
  grantId: string;
  grant: Grant;
}

export interface SessionManagerOptions {
  storage: ISessionStorage;
  tokenHandler: TokenHandler;
  clock: Clock;
  /** Salt for subject identifier derivation */
  salt: string;
  defaultUsageRules: UsageRules;
  logger?: Logger;
}

/**
 * Owns the user session → client session → grant hierarchy.
 *
 * Mutations are read-modify-write. Everything that changes a grant runs
 * under a per-session-id lock, and everything that changes a user's
 * client list under a per-user lock.
 */
export class SessionManager {
  readonly tokenHandler: TokenHandler;
  private readonly storage: ISessionStorage;
  private readonly clock: Clock;
  private readonly salt: string;
  private readonly defaultUsageRules: UsageRules;
  private readonly logger: Logger;
  private readonly locks = new KeyedMutex();

  constructor(options: SessionManagerOptions) {
    this.storage = options.storage;
    this.tokenHandler = options.tokenHandler;
    this.clock = options.clock;
    this.salt = options.salt;
    this.defaultUsageRules = options.defaultUsageRules;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run `fn` with exclusive access to a session id
   */
  withSessionLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(sessionId, fn);
  }

  /**
   * Derive the subject identifier a client sees for a user
   */
  subjectFor(userId: string, subType: SubjectType = 'public', sectorIdentifier?: string): string {
    return SUBJECT_DERIVERS[subType](userId, this.salt, sectorIdentifier);
  }

  /**
   * Create the user session, client session and grant chain for a
   * successful authentication. An existing user session is extended; a
   * missing or revoked client session is replaced.
   */
  async createSession(input: CreateSessionInput): Promise<string> {
    const { userId, clientId } = input;

    return this.withSessionLock(sessionKey(userId), async () => {
      const existingUser = await this.lookup([userId]);
      const userSession: UserSessionRecord =
        existingUser?.kind === 'user'
          ? { ...existingUser, revoked: false }
          : { kind: 'user', userId, subordinate: [], revoked: false };

      const existingClient = await this.lookup([userId, clientId]);
      const clientSession: ClientSessionRecord =
        existingClient?.kind === 'client' && !existingClient.revoked
          ? existingClient
          : {
              kind: 'client',
              userId,
              clientId,
              sub: this.subjectFor(userId, input.subType, input.sectorIdentifier),
              subordinate: [],
              revoked: false,
            };

      const grant = Grant.create({
        sub: clientSession.sub,
        scope: input.scope ?? input.authRequest.scope,
        resources: input.resources,
        authorizationRequest: input.authRequest,
        authenticationEvent: input.authnEvent,
        claims: input.claims,
        usageRules: input.usageRules ?? this.defaultUsageRules,
        issuedAt: this.clock.now(),
        grantKind: input.grantKind,
      });

      if (!userSession.subordinate.includes(clientId)) {
        userSession.subordinate = [...userSession.subordinate, clientId];
      }
      clientSession.subordinate = [...clientSession.subordinate, grant.id];

      const sessionId = sessionKey(userId, clientId, grant.id);
      await this.storage.set(sessionId, grant.toRecord());
      await this.storage.set(sessionKey(userId, clientId), clientSession);
      await this.storage.set(sessionKey(userId), userSession);

      this.logger.debug('Session created', { userId, clientId, grantId: grant.id });
      return sessionId;
    });
  }

  /**
   * Record at a one to three part path
   */
  async get(path: SessionPath): Promise<SessionRecord> {
    const record = await this.lookup(path);
    if (!record) {
      throw new UnknownSession(`No session at ${sessionKey(...path)}`);
    }
    return record;
  }

  async set(path: SessionPath, record: SessionRecord): Promise<void> {
    await this.storage.set(sessionKey(...path), record);
  }

  async getUserSession(userId: string): Promise<UserSessionRecord> {
    const record = await this.get([userId]);
    if (record.kind !== 'user') {
      throw new UnknownSession(`No user session for ${userId}`);
    }
    return record;
  }

  async getClientSession(userId: string, clientId: string): Promise<ClientSessionRecord> {
    const record = await this.get([userId, clientId]);
    if (record.kind !== 'client') {
      throw new UnknownSession(`No client session for ${userId}/${clientId}`);
    }
    return record;
  }

  async getGrant(sessionId: string): Promise<Grant> {
    const { userId, clientId, grantId } = unpackGrantKey(sessionId);
    const record = await this.get([userId, clientId, grantId]);
    if (record.kind !== 'grant') {
      throw new UnknownSession(`No grant at ${sessionId}`);
    }
    return new Grant(record);
  }

  async getAuthenticationEvent(sessionId: string): Promise<AuthenticationEvent> {
    return (await this.getGrant(sessionId)).authenticationEvent;
  }

  /**
   * Aggregate view of the records a session id addresses
   */
  async getSessionInfo(sessionId: string, want: SessionInfoOptions = {}): Promise<SessionInfo> {
    const [userId, clientId, grantId] = unpackSessionKey(sessionId);
    const info: SessionInfo = { sessionId, userId, clientId, grantId };

    if (want.user) {
      info.userSession = await this.getUserSession(userId);
    }
    if (want.client && clientId !== undefined) {
      info.clientSession = await this.getClientSession(userId, clientId);
    }
    if (want.grant && grantId !== undefined) {
      info.grant = await this.getGrant(sessionId);
    }
    return info;
  }

  /**
   * Session info for the grant holding a token value
   */
  async getSessionInfoByToken(value: string, want: SessionInfoOptions = {}): Promise<GrantSessionInfo> {
    const sid = await this.tokenHandler.sid(value);

    let grant: Grant;
    try {
      grant = await this.getGrant(sid);
    } catch (error) {
      if (error instanceof UnknownSession) {
        throw new UnknownToken('Token refers to an unknown session');
      }
      throw error;
    }

    if (!grant.getToken(value)) {
      throw new UnknownToken('Token not held by its session');
    }

    const info = await this.getSessionInfo(sid, { ...want, grant: false });
    const { clientId, grantId } = unpackGrantKey(sid);
    return { ...info, clientId, grantId, grant };
  }

  async findToken(sessionId: string, value: string): Promise<SessionToken> {
    const grant = await this.getGrant(sessionId);
    const token = grant.getToken(value);
    if (!token) {
      throw new UnknownToken('Unknown token');
    }
    return token;
  }

  /**
   * Load a grant, let `fn` change it and persist it once `fn` succeeds.
   * Nothing is written if `fn` throws.
   */
  async updateGrant<T>(sessionId: string, fn: (grant: Grant) => Promise<T>): Promise<T> {
    return this.withSessionLock(sessionId, async () => {
      const grant = await this.getGrant(sessionId);
      const result = await fn(grant);
      await this.storage.set(sessionId, grant.toRecord());
      return result;
    });
  }

  /**
   * Mint a token in a grant and persist the grant
   */
  async mintToken(
    sessionId: string,
    type: TokenType,
    options: Omit<MintOptions, 'now' | 'basedOn'> & { basedOn?: string } = {}
  ): Promise<SessionToken> {
    const { basedOn, ...rest } = options;
    return this.updateGrant(sessionId, async (grant) => {
      const base = basedOn === undefined ? undefined : grant.getToken(basedOn);
      if (basedOn !== undefined && !base) {
        throw new UnknownToken('Unknown base token');
      }
      return grant.mintToken(sessionId, type, this.tokenHandler.codec(type), {
        ...rest,
        basedOn: base,
        now: this.clock.now(),
      });
    });
  }

  /**
   * Revoke one token. Tokens minted from it and the token it was
   * minted from stay as they are.
   */
  async revokeToken(sessionId: string, value: string): Promise<void> {
    await this.updateGrant(sessionId, async (grant) => {
      const token = grant.getToken(value);
      if (!token) {
        throw new UnknownToken('Unknown token');
      }
      token.revoke();
    });
  }

  /**
   * Revoke a grant and every token it owns
   */
  async revokeGrant(sessionId: string): Promise<void> {
    await this.updateGrant(sessionId, async (grant) => {
      grant.revoke();
    });
  }

  /**
   * Mark a client session revoked and revoke all grants under it
   */
  async revokeClientSession(sessionId: string): Promise<void> {
    const [userId, clientId] = unpackSessionKey(sessionId);
    if (clientId === undefined) {
      throw new UnknownSession(`Not a client session id: ${sessionId}`);
    }

    await this.withSessionLock(sessionKey(userId), async () => {
      const clientSession = await this.getClientSession(userId, clientId);
      for (const grantId of clientSession.subordinate) {
        const grantKey = sessionKey(userId, clientId, grantId);
        if (await this.lookup([userId, clientId, grantId])) {
          await this.revokeGrant(grantKey);
        }
      }
      await this.storage.set(sessionKey(userId, clientId), { ...clientSession, revoked: true });
    });

    this.logger.debug('Client session revoked', { userId, clientId });
  }

  /**
   * Mark a user session revoked
   */
  async revokeUserSession(userId: string): Promise<void> {
    await this.withSessionLock(sessionKey(userId), async () => {
      const userSession = await this.getUserSession(userId);
      await this.storage.set(sessionKey(userId), { ...userSession, revoked: true });
    });
  }

  /**
   * Every grant of the (user, client) pair a session id belongs to
   */
  async grants(sessionId: string): Promise<Grant[]> {
    const [userId, clientId] = unpackSessionKey(sessionId);
    if (clientId === undefined) {
      throw new UnknownSession(`Not a client session id: ${sessionId}`);
    }

    const clientSession = await this.getClientSession(userId, clientId);
    const grants: Grant[] = [];
    for (const grantId of clientSession.subordinate) {
      const record = await this.lookup([userId, clientId, grantId]);
      if (record?.kind === 'grant') {
        grants.push(new Grant(record));
      }
    }
    return grants;
  }

  private async lookup(path: SessionPath): Promise<SessionRecord | null> {
    return this.storage.get(sessionKey(...path));
  }
}
