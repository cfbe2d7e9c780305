export {
  evaluateHeader,
  fromFetchHeaders,
  fromIncomingHeaders,
  HAWK_SCHEME,
  locateHeader,
  splitScheme,
} from "./auth.js";
export { AuthorizationHeader, ServerAuthorizationHeader } from "./guards.js";
export { formatHawkHeader, parseHawkHeader } from "./hawk.js";
export type { AuthorizationEnv, HawkBindings, HawkGuardOptions, ServerAuthorizationEnv } from "./middleware.js";
export { hawkAuthorization, hawkServerAuthorization, headerSourceFor } from "./middleware.js";
