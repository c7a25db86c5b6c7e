import type { KeyMaterial } from '../crypto/jwt.js';
import type { Clock } from '../session/clock.js';
import type { IUserStorage } from '../storage/interfaces/user-storage.js';
import type { AuthenticationMethod } from './method.js';
import { NoAuthn } from './no-authn.js';
import { UserPassAuthn } from './user-pass.js';

export interface NoAuthnConfig {
  kind: 'no_authn';
  user: string;
  id?: string;
  acr?: string;
}

export interface UserPassAuthnConfig {
  kind: 'user_pass';
  /** Path the login form posts to */
  action?: string;
  ticketTtl?: number;
  id?: string;
  acr?: string;
}

export type AuthnMethodConfig = NoAuthnConfig | UserPassAuthnConfig;

export interface AuthnDependencies {
  keys: KeyMaterial;
  issuer: string;
  clock: Clock;
  users: IUserStorage;
}

/**
 * Factories for every authentication method the provider ships, keyed by
 * the `kind` used in configuration
 */
export const AUTHN_METHOD_FACTORIES = {
  no_authn: (config: NoAuthnConfig): AuthenticationMethod => new NoAuthn(config.user, config.id, config.acr),
  user_pass: (config: UserPassAuthnConfig, deps: AuthnDependencies): AuthenticationMethod =>
    new UserPassAuthn({
      ...deps,
      action: config.action ?? '/authorize/verify',
      ticketTtl: config.ticketTtl,
      id: config.id,
      acr: config.acr,
    }),
} as const;

export function createAuthnMethod(config: AuthnMethodConfig, deps: AuthnDependencies): AuthenticationMethod {
  switch (config.kind) {
    case 'no_authn':
      return AUTHN_METHOD_FACTORIES.no_authn(config);
    case 'user_pass':
      return AUTHN_METHOD_FACTORIES.user_pass(config, deps);
  }
}

/**
 * Configured authentication methods, in preference order
 */
export class AuthnBroker {
  private readonly methods: AuthenticationMethod[];

  constructor(methods: AuthenticationMethod[]) {
    if (methods.length === 0) {
      throw new Error('At least one authentication method is required');
    }
    this.methods = [...methods];
  }

  static fromConfig(configs: AuthnMethodConfig[], deps: AuthnDependencies): AuthnBroker {
    return new AuthnBroker(configs.map((config) => createAuthnMethod(config, deps)));
  }

  get(id: string): AuthenticationMethod | undefined {
    return this.methods.find((method) => method.id === id);
  }

  /**
   * First method whose ACR is among the requested values
   */
  pick(acrValues: readonly string[]): AuthenticationMethod | undefined {
    for (const acr of acrValues) {
      const method = this.methods.find((candidate) => candidate.acr === acr);
      if (method) {
        return method;
      }
    }
    return undefined;
  }

  default(): AuthenticationMethod {
    const [first] = this.methods;
    if (!first) {
      throw new Error('No authentication method configured');
    }
    return first;
  }

  all(): readonly AuthenticationMethod[] {
    return this.methods;
  }
}
