export { findCookiesFile, resolveCookieSource } from './discovery';
export type { CookieOptions } from './discovery';
