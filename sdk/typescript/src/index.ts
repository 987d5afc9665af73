export { defaultConfig, defaults, expandHome, loadConfig } from "./config.js";
export { formatLocalDateTime, normalizeDate } from "./dates.js";
export {
  ErrorCode,
  LookupError,
  errorMessage,
  interruptedError,
  toLookupError
} from "./errors.js";
export { assertIp, lookupGeolocation, parseGeoResponse } from "./geo.js";
export { lookupRegistration, parseRdapResponse } from "./rdap.js";
export type * from "./types.js";
