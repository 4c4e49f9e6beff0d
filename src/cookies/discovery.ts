import { access } from 'fs/promises';
import { join } from 'path';
import { getLogger } from '../utils/logger';
import { InvalidInputError } from '../utils/errors';
import type { CookieSource } from '../ytdlp/types';

/** Looked up in this order; the first that exists wins */
export const COOKIE_FILE_CANDIDATES = [
  'www.youtube.com_cookies.txt',
  'youtube.com_cookies.txt',
  'cookies.txt',
] as const;

export const SUPPORTED_BROWSERS = ['chrome', 'firefox', 'edge', 'brave', 'opera', 'safari'] as const;

export interface CookieOptions {
  cookies?: string;
  browser?: string;
  /** Used when neither cookies nor browser is given */
  fallbackCookies?: string | null;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find an exported cookies file in the given directory
 */
export async function findCookiesFile(dir: string = '.'): Promise<string | null> {
  for (const name of COOKIE_FILE_CANDIDATES) {
    const candidate = join(dir, name);
    if (await fileExists(candidate)) {
      getLogger().debug(`Found cookies file: ${candidate}`);
      return candidate;
    }
  }
  return null;
}

/**
 * Turn --cookies / --browser into a cookie source
 * A cookies path that does not exist is dropped with a warning
 */
export async function resolveCookieSource(options: CookieOptions): Promise<CookieSource> {
  const logger = getLogger();

  if (options.cookies && options.browser) {
    throw InvalidInputError.fromConflictingCookieOptions();
  }

  if (options.browser) {
    return { kind: 'browser', browser: options.browser };
  }

  const path = options.cookies ?? options.fallbackCookies ?? undefined;
  if (!path) {
    return { kind: 'none' };
  }

  if (await fileExists(path)) {
    return { kind: 'file', path };
  }

  logger.warn(`Cookies file ${path} not found. Proceeding without cookies.`);
  return { kind: 'none' };
}
