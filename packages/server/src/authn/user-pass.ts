import { z } from 'zod';
import type { KeyMaterial } from '../crypto/jwt.js';
import type { Clock } from '../session/clock.js';
import type { IUserStorage } from '../storage/interfaces/user-storage.js';
import { BaseAuthenticationMethod, type AuthenticationArgs, type AuthenticationChallenge } from './method.js';
import { OAuthError } from '../errors/oauth-error.js';
import { escapeHtml } from '../utils/html.js';
import { ACR_INTERNET_PROTOCOL_PASSWORD, DEFAULT_LOGIN_TICKET_TTL } from '../config/constants.js';

const TICKET_TYPE = 'login-ticket+jwt';

const ticketSchema = z.object({
  req: z.record(z.string(), z.string()),
  cid: z.string(),
});

export const loginFormSchema = z.object({
  username: z.string().min(1),
  password: z.string(),
  ticket: z.string().min(1),
});

export type LoginForm = z.output<typeof loginFormSchema>;

export type LoginResult =
  | { ok: true; userId: string; request: Record<string, string> }
  | { ok: false; body: string };

export interface UserPassAuthnOptions {
  keys: KeyMaterial;
  issuer: string;
  clock: Clock;
  users: IUserStorage;
  /** Where the login form posts to */
  action: string;
  ticketTtl?: number;
  id?: string;
  acr?: string;
}

/**
 * Username/password login. The form carries the authorization request
 * in a signed ticket so the verify step can resume the flow statelessly.
 */
export class UserPassAuthn extends BaseAuthenticationMethod {
  private readonly ticketTtl: number;

  constructor(private readonly options: UserPassAuthnOptions) {
    super(options.id ?? 'user_pass', options.acr ?? ACR_INTERNET_PROTOCOL_PASSWORD);
    this.ticketTtl = options.ticketTtl ?? DEFAULT_LOGIN_TICKET_TTL;
  }

  async challenge(args: AuthenticationArgs): Promise<AuthenticationChallenge> {
    const iat = this.options.clock.now();
    const ticket = await this.options.keys.sign(
      {
        iss: this.options.issuer,
        aud: this.options.issuer,
        iat,
        exp: iat + this.ticketTtl,
        req: args.request,
        cid: args.clientId,
      },
      { typ: TICKET_TYPE }
    );

    return { kind: 'html', body: this.renderForm(ticket, args.loginHint) };
  }

  /**
   * Check posted credentials. A wrong password renders the form again;
   * an invalid or expired ticket is an `access_denied`.
   */
  async verify(form: LoginForm): Promise<LoginResult> {
    let ticket: z.output<typeof ticketSchema>;
    try {
      const payload = await this.options.keys.verify(form.ticket, {
        issuer: this.options.issuer,
        audience: this.options.issuer,
        typ: TICKET_TYPE,
        clockTolerance: 0,
        currentDate: new Date(this.options.clock.now() * 1000),
      });
      ticket = ticketSchema.parse(payload);
    } catch (error) {
      throw new OAuthError('access_denied', 'Login ticket is invalid or expired', { cause: error });
    }

    if (!(await this.options.users.verifyPassword(form.username, form.password))) {
      return { ok: false, body: this.renderForm(form.ticket, form.username, 'Invalid username or password') };
    }

    return { ok: true, userId: form.username, request: ticket.req };
  }

  private renderForm(ticket: string, username?: string, error?: string): string {
    const message = error ? `\n    <p class="error">${escapeHtml(error)}</p>` : '';
    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Sign in</title>
</head>
<body>
  <form method="post" action="${escapeHtml(this.options.action)}">${message}
    <input type="hidden" name="ticket" value="${escapeHtml(ticket)}"/>
    <label>Username <input type="text" name="username" value="${escapeHtml(username ?? '')}"/></label>
    <label>Password <input type="password" name="password"/></label>
    <button type="submit">Sign in</button>
  </form>
</body>
</html>`;
  }
}
