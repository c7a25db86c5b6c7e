import type { TokenRecord, TokenType } from './types.js';

/**
 * One issued credential inside a grant
 */
export class SessionToken {
  constructor(private readonly record: TokenRecord) {}

  get id(): string {
    return this.record.id;
  }

  get type(): TokenType {
    return this.record.type;
  }

  get value(): string {
    return this.record.value;
  }

  /** Index of the base token in the owning grant's token list */
  get basedOn(): number | null {
    return this.record.basedOn;
  }

  get usageCount(): number {
    return this.record.usageCount;
  }

  get maxUsage(): number | undefined {
    return this.record.maxUsage;
  }

  get issuedAt(): number {
    return this.record.issuedAt;
  }

  get expiresAt(): number | undefined {
    return this.record.expiresAt;
  }

  get revoked(): boolean {
    return this.record.revoked;
  }

  get scope(): string[] | undefined {
    return this.record.scope;
  }

  get resources(): string[] | undefined {
    return this.record.resources;
  }

  registerUsage(): void {
    this.record.usageCount += 1;
  }

  maxUsageReached(): boolean {
    return this.record.maxUsage !== undefined && this.record.usageCount >= this.record.maxUsage;
  }

  isExpired(now: number): boolean {
    return this.record.expiresAt !== undefined && now >= this.record.expiresAt;
  }

  isActive(now: number): boolean {
    return !this.record.revoked && !this.isExpired(now) && !this.maxUsageReached();
  }

  revoke(): void {
    this.record.revoked = true;
  }

  /** Seconds left before expiry, if the token expires */
  expiresIn(now: number): number | undefined {
    return this.record.expiresAt === undefined ? undefined : Math.max(this.record.expiresAt - now, 0);
  }

  toRecord(): TokenRecord {
    return { ...this.record };
  }
}
