export { createOidcServer, type OidcServerOptions } from './app.js';
export {
  createProviderContext,
  defaultUsageRules,
  type ProviderContext,
  type ProviderContextOptions,
  type ProviderSettings,
  type ReAuthenticatePredicate,
} from './context.js';
export { AuthorizationFlow, computeSessionState, type FlowOutcome } from './authorization/flow.js';
export { LogoutCoordinator, frontchannelIframe, type LogoutPlan } from './logout/coordinator.js';
export { SessionManager } from './session/manager.js';
export { Grant } from './session/grant.js';
export { SessionToken } from './session/token.js';
export { ClaimsResolver, claimsMatch } from './session/claims.js';
export { systemClock, type Clock } from './session/clock.js';
export { AuthnBroker, AUTHN_METHOD_FACTORIES, type AuthnMethodConfig } from './authn/registry.js';
export type { AuthenticationMethod } from './authn/method.js';
export { createLogger, silentLogger, type Logger } from './logging/logger.js';
export * from './types/index.js';
export * from './storage/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
