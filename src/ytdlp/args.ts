/**
 * yt-dlp argument construction
 * Maps ytgrab options onto yt-dlp flags in a fixed order:
 * cookies, format, output, subtitles, playlist, metadata, thumbnail, sponsorblock, urls
 */

import type { CookieSource, DownloadMode, DownloadRequest } from './types';

export const BEST_MP4_SELECTOR = 'bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]';
export const DEFAULT_OUTPUT_TEMPLATE = '%(title)s.%(ext)s';
export const DEFAULT_SUBTITLE_LANGS = 'en';
export const DEFAULT_CUSTOM_FORMAT = 'bestvideo+bestaudio';

export function cookieArgs(cookies: CookieSource): string[] {
  switch (cookies.kind) {
    case 'file':
      return ['--cookies', cookies.path];
    case 'browser':
      return ['--cookies-from-browser', cookies.browser];
    case 'none':
      return [];
  }
}

export function modeArgs(mode: DownloadMode): string[] {
  switch (mode.kind) {
    case 'video':
      return ['-f', BEST_MP4_SELECTOR];
    case 'audio':
      return ['--extract-audio', '--audio-format', 'mp3'];
    case 'format':
      return ['-f', mode.selector];
    case 'default':
      return [];
  }
}

export function buildDownloadArgs(request: DownloadRequest): string[] {
  const args = [...cookieArgs(request.cookies), ...modeArgs(request.mode)];

  if (request.outputTemplate) {
    args.push('-o', request.outputTemplate);
  }

  if (request.subtitles !== false) {
    args.push('--write-subs', '--sub-langs', request.subtitles);
  }

  if (!request.playlist) {
    args.push('--no-playlist');
  }

  if (request.metadata) {
    args.push('--add-metadata');
  }

  if (request.thumbnail) {
    args.push('--embed-thumbnail');
  }

  if (request.sponsorblock) {
    args.push('--sponsorblock-remove');
  }

  args.push(...request.urls);
  return args;
}

export function buildFormatListArgs(url: string, cookies: CookieSource = { kind: 'none' }): string[] {
  return ['-F', url, ...cookieArgs(cookies)];
}

/**
 * Split a prompt answer like "url1  url2\nurl3" into URLs
 */
export function splitUrls(text: string): string[] {
  return text.split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Normalize a comma-separated language list ("en, es,,fr" -> "en,es,fr")
 * Falls back to the default when nothing is left
 */
export function normalizeSubtitleLangs(value: string): string {
  const langs = value
    .split(',')
    .map((lang) => lang.trim())
    .filter((lang) => lang.length > 0);
  return langs.length > 0 ? langs.join(',') : DEFAULT_SUBTITLE_LANGS;
}
