export { createAuthorizeRoutes, type AuthorizeRouteOptions } from './authorize.js';
export { createParRoutes, type ParRouteOptions } from './par.js';
export { createTokenRoutes, type TokenRouteOptions } from './token.js';
export { createUserInfoRoutes, type UserInfoRoutesOptions } from './userinfo.js';
export { createIntrospectRoutes, type IntrospectRouteOptions } from './introspect.js';
export { createRevokeRoutes, type RevokeRouteOptions } from './revoke.js';
export { createEndSessionRoutes, type EndSessionRouteOptions } from './end-session.js';
