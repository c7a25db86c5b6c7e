import { BaseAuthenticationMethod, type AuthenticationChallenge } from './method.js';
import { ACR_UNSPECIFIED } from '../config/constants.js';

/**
 * Authenticates every request as one configured user. Development and tests only.
 */
export class NoAuthn extends BaseAuthenticationMethod {
  constructor(
    private readonly user: string,
    id: string = 'no_authn',
    acr: string = ACR_UNSPECIFIED
  ) {
    super(id, acr);
  }

  async challenge(): Promise<AuthenticationChallenge> {
    return { kind: 'authenticated', userId: this.user };
  }
}
