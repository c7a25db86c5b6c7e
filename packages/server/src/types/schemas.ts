import { z } from 'zod';
import {
  RESPONSE_MODES,
  RESPONSE_TYPE_VALUES,
  TOKEN_TYPES,
} from '../config/constants.js';

/**
 * Zod schemas for inbound protocol parameters and persisted session records
 */

const CLAIMS_USAGES = ['userinfo', 'id_token', 'introspection', 'access_token'] as const;
const PROMPTS = ['none', 'login', 'consent', 'select_account'] as const;

// Space separated string, or an already split list
const spaceList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(' ').filter((part) => part.length > 0)));

const jsonObject = z.string().transform((value, ctx): unknown => {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Value is not valid JSON' });
    return z.NEVER;
  }
});

export const claimRequestSpecSchema = z.object({
  essential: z.boolean().optional(),
  value: z.unknown().optional(),
  values: z.array(z.unknown()).optional(),
});

export const claimsRestrictionSchema = z.record(z.string(), claimRequestSpecSchema.nullable());

export const claimsParameterSchema = z.object({
  userinfo: claimsRestrictionSchema.optional(),
  id_token: claimsRestrictionSchema.optional(),
});

/**
 * Authorization request parameters. Accepts the raw string form from a
 * query, form body or request object, and the normalized form stored in
 * a grant.
 */
export const authorizationRequestSchema = z.object({
  client_id: z.string().min(1, 'client_id is required'),
  response_type: spaceList.pipe(z.array(z.enum(RESPONSE_TYPE_VALUES)).min(1, 'response_type is required')),
  scope: spaceList.optional().transform((value) => value ?? []),
  redirect_uri: z.string().optional(),
  state: z.string().optional(),
  nonce: z.string().optional(),
  response_mode: z.enum(RESPONSE_MODES).optional(),
  prompt: spaceList.pipe(z.array(z.enum(PROMPTS))).optional(),
  max_age: z.coerce.number().int().nonnegative().optional(),
  acr_values: spaceList.optional(),
  login_hint: z.string().optional(),
  id_token_hint: z.string().optional(),
  ui_locales: z.string().optional(),
  claims: z.union([jsonObject, z.record(z.string(), z.unknown())]).pipe(claimsParameterSchema).optional(),
  resource: z
    .union([
      z.array(z.string()),
      z.string().startsWith('[').pipe(jsonObject).pipe(z.array(z.string())),
      z.string().transform((value) => [value]),
    ])
    .optional(),
  upm_answer: z.string().optional(),
});

export type ParsedAuthorizationRequest = z.output<typeof authorizationRequestSchema>;

const usageRuleSchema = z.object({
  expires_in: z.union([z.number(), z.string()]).optional(),
  max_usage: z.number().int().optional(),
  supports_minting: z.array(z.enum(TOKEN_TYPES)).optional(),
});

export const usageRulesSchema = z.record(z.enum(TOKEN_TYPES), usageRuleSchema);

const tokenRecordSchema = z.object({
  id: z.string(),
  type: z.enum(TOKEN_TYPES),
  value: z.string(),
  basedOn: z.number().int().nullable(),
  usageCount: z.number().int(),
  maxUsage: z.number().int().optional(),
  issuedAt: z.number(),
  expiresAt: z.number().optional(),
  revoked: z.boolean(),
  scope: z.array(z.string()).optional(),
  resources: z.array(z.string()).optional(),
});

const authenticationEventSchema = z.object({
  uid: z.string(),
  salt: z.string(),
  validUntil: z.number(),
  authnInfo: z.string(),
  authnTime: z.number().optional(),
});

const userSessionSchema = z.object({
  kind: z.literal('user'),
  userId: z.string(),
  subordinate: z.array(z.string()),
  revoked: z.boolean(),
});

const clientSessionSchema = z.object({
  kind: z.literal('client'),
  userId: z.string(),
  clientId: z.string(),
  sub: z.string(),
  subordinate: z.array(z.string()),
  revoked: z.boolean(),
});

const grantRecordSchema = z.object({
  kind: z.literal('grant'),
  id: z.string(),
  grantKind: z.enum(['authorization', 'exchange']),
  sub: z.string(),
  scope: z.array(z.string()),
  resources: z.array(z.string()),
  authorizationRequest: authorizationRequestSchema,
  authenticationEvent: authenticationEventSchema,
  claims: z.record(z.enum(CLAIMS_USAGES), claimsRestrictionSchema),
  usageRules: usageRulesSchema,
  issuedTokens: z.array(tokenRecordSchema),
  issuedAt: z.number(),
  revoked: z.boolean(),
});

export const sessionRecordSchema = z.discriminatedUnion('kind', [
  userSessionSchema,
  clientSessionSchema,
  grantRecordSchema,
]);

/**
 * Raw parameters of a pushed authorization request
 */
export const parametersSchema = z.record(z.string(), z.string());

/**
 * Token endpoint form body
 */
export const tokenRequestSchema = z.discriminatedUnion('grant_type', [
  z.object({
    grant_type: z.literal('authorization_code'),
    code: z.string().min(1, 'code is required'),
    redirect_uri: z.string().optional(),
    client_id: z.string().optional(),
  }),
  z.object({
    grant_type: z.literal('refresh_token'),
    refresh_token: z.string().min(1, 'refresh_token is required'),
    scope: spaceList.optional(),
    client_id: z.string().optional(),
  }),
]);

export type TokenRequest = z.output<typeof tokenRequestSchema>;

/**
 * End session request
 * OpenID Connect RP-Initiated Logout 1.0 Section 2
 */
export const endSessionRequestSchema = z.object({
  id_token_hint: z.string().optional(),
  post_logout_redirect_uri: z.string().optional(),
  state: z.string().optional(),
  client_id: z.string().optional(),
  logout_hint: z.string().optional(),
  ui_locales: z.string().optional(),
});

export type EndSessionRequest = z.output<typeof endSessionRequestSchema>;
