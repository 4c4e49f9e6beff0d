export interface EnvConfig {
  ytDlpBin: string;
  defaultCookiesFile: string | null;
  verbose: boolean;
}

const TRUTHY = ['1', 'true', 'yes', 'on'];

/**
 * Read ytgrab settings from the environment
 * - YTGRAB_BIN: downloader executable (default: yt-dlp)
 * - YTGRAB_COOKIES_FILE: cookies file used in flag mode when no cookie option is given
 * - YTGRAB_VERBOSE: enable debug logging
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const bin = source.YTGRAB_BIN?.trim();
  const cookies = source.YTGRAB_COOKIES_FILE?.trim();
  const verbose = source.YTGRAB_VERBOSE?.trim().toLowerCase();

  return {
    ytDlpBin: bin || 'yt-dlp',
    defaultCookiesFile: cookies || null,
    verbose: verbose !== undefined && TRUTHY.includes(verbose),
  };
}
