import type { AuthorizationRequest, UsageRule } from '@opcore/shared';
import type {
  AuthenticationEvent,
  ClaimsRestriction,
  ClaimsUsage,
  GrantKind,
  GrantRecord,
  TokenType,
  UsageRules,
} from './types.js';
import type { TokenCodec } from '../token/codec.js';
import { SessionToken } from './token.js';
import { MintingNotAllowed } from '../errors/session-errors.js';
import { TOKEN_TYPE_AUTHORIZATION_CODE, TOKEN_TYPE_TAGS } from '../config/constants.js';
import { generateId } from '../crypto/random.js';

export interface MintOptions {
  now: number;
  basedOn?: SessionToken;
  usageRules?: UsageRule;
  expiresAt?: number;
  scope?: string[];
  resources?: string[];
  /** Extra claims handed to the codec */
  extra?: Record<string, unknown>;
}

export interface GrantInit {
  sub: string;
  scope: string[];
  resources?: string[];
  authorizationRequest: AuthorizationRequest;
  authenticationEvent: AuthenticationEvent;
  claims?: Partial<Record<ClaimsUsage, ClaimsRestriction>>;
  usageRules: UsageRules;
  issuedAt: number;
  grantKind?: GrantKind;
  id?: string;
}

/**
 * `expires_in` may be configured as a string; anything else non-numeric is rejected
 */
export function coerceExpiresIn(value: number | string): number {
  const seconds = typeof value === 'number' ? value : parseInt(value, 10);
  if (!Number.isFinite(seconds)) {
    throw new TypeError(`Invalid expires_in: ${String(value)}`);
  }
  return Math.trunc(seconds);
}

export function isAuthenticationEventValid(event: AuthenticationEvent, now: number): boolean {
  return now < event.validUntil;
}

/**
 * What a (user, client) pair was authorized for in one authentication
 * cycle, plus every token minted under it. A grant exclusively owns its
 * tokens; chains between them are indexes into `tokens`.
 */
export class Grant {
  private readonly record: Omit<GrantRecord, 'issuedTokens'>;
  private readonly issued: SessionToken[];

  constructor(record: GrantRecord) {
    const { issuedTokens, ...rest } = record;
    this.record = { ...rest };
    this.issued = issuedTokens.map((token) => new SessionToken({ ...token }));
  }

  static create(init: GrantInit): Grant {
    return new Grant({
      kind: 'grant',
      id: init.id ?? generateId(),
      grantKind: init.grantKind ?? 'authorization',
      sub: init.sub,
      scope: init.scope,
      resources: init.resources ?? [],
      authorizationRequest: init.authorizationRequest,
      authenticationEvent: init.authenticationEvent,
      claims: init.claims ?? {},
      usageRules: init.usageRules,
      issuedTokens: [],
      issuedAt: init.issuedAt,
      revoked: false,
    });
  }

  get id(): string {
    return this.record.id;
  }

  get sub(): string {
    return this.record.sub;
  }

  get scope(): string[] {
    return this.record.scope;
  }

  get resources(): string[] {
    return this.record.resources;
  }

  get authorizationRequest(): AuthorizationRequest {
    return this.record.authorizationRequest;
  }

  get authenticationEvent(): AuthenticationEvent {
    return this.record.authenticationEvent;
  }

  get claims(): Partial<Record<ClaimsUsage, ClaimsRestriction>> {
    return this.record.claims;
  }

  setClaims(claims: Partial<Record<ClaimsUsage, ClaimsRestriction>>): void {
    this.record.claims = { ...claims };
  }

  get usageRules(): UsageRules {
    return this.record.usageRules;
  }

  get grantKind(): GrantKind {
    return this.record.grantKind;
  }

  get revoked(): boolean {
    return this.record.revoked;
  }

  get tokens(): readonly SessionToken[] {
    return this.issued;
  }

  isActive(): boolean {
    return !this.record.revoked;
  }

  /**
   * Whether a token of `type` may be minted from `token`. Governed by
   * this grant's usage rules for the base token's type.
   */
  supportsMinting(token: SessionToken, type: TokenType): boolean {
    const supported = this.record.usageRules[token.type]?.supports_minting ?? [];
    return supported.includes(type);
  }

  async mintToken(
    sessionId: string,
    type: TokenType,
    codec: TokenCodec,
    options: MintOptions
  ): Promise<SessionToken> {
    const rules = options.usageRules ?? this.record.usageRules[type] ?? {};
    const { now } = options;

    let basedOn: number | null = null;
    if (options.basedOn) {
      const index = this.issued.indexOf(options.basedOn);
      if (index === -1) {
        throw new MintingNotAllowed('Base token does not belong to this grant');
      }
      if (!options.basedOn.isActive(now)) {
        throw new MintingNotAllowed(`Base ${options.basedOn.type} is not active`);
      }
      if (!this.supportsMinting(options.basedOn, type)) {
        throw new MintingNotAllowed(`A ${options.basedOn.type} can not be used to mint a ${type}`);
      }
      basedOn = index;
    }

    let expiresAt = options.expiresAt;
    if (expiresAt === undefined && rules.expires_in !== undefined) {
      expiresAt = now + coerceExpiresIn(rules.expires_in);
    }

    const extra: Record<string, unknown> = { ...options.extra };
    if (expiresAt !== undefined) {
      extra['exp'] = expiresAt;
    }

    const value = await codec.encode(sessionId, TOKEN_TYPE_TAGS[type], extra);

    const maxUsage = rules.max_usage ?? (type === TOKEN_TYPE_AUTHORIZATION_CODE ? 1 : undefined);

    const token = new SessionToken({
      id: generateId(),
      type,
      value,
      basedOn,
      usageCount: 0,
      maxUsage,
      issuedAt: now,
      expiresAt,
      revoked: false,
      scope: options.scope,
      resources: options.resources,
    });

    this.issued.push(token);
    return token;
  }

  getToken(value: string): SessionToken | undefined {
    return this.issued.find((token) => token.value === value);
  }

  /**
   * The token `token` was minted from, if any
   */
  baseOf(token: SessionToken): SessionToken | null {
    if (token.basedOn === null) {
      return null;
    }
    return this.issued[token.basedOn] ?? null;
  }

  /**
   * Tokens minted directly from `token`
   */
  mintedFrom(token: SessionToken): SessionToken[] {
    const index = this.issued.indexOf(token);
    if (index === -1) {
      return [];
    }
    return this.issued.filter((candidate) => candidate.basedOn === index);
  }

  /**
   * Revoke the grant and every token it owns
   */
  revoke(): void {
    this.record.revoked = true;
    for (const token of this.issued) {
      token.revoke();
    }
  }

  toRecord(): GrantRecord {
    return {
      ...this.record,
      issuedTokens: this.issued.map((token) => token.toRecord()),
    };
  }
}
