import { Command } from 'commander';
import { getLogger } from '../utils/logger';
import { DEFAULT_SUBTITLE_LANGS, normalizeSubtitleLangs } from '../ytdlp/args';
import type { CookieSource, DownloadMode, DownloadRequest } from '../ytdlp/types';
import type { CliAction, CliOptions } from './types';

export const VERSION = '0.1.0';

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('ytgrab')
    .description('Video downloader CLI with cookie support, built on yt-dlp')
    .version(VERSION)
    .argument('[urls...]', 'Video URL(s) to download; omit to answer prompts instead')
    .option('-f, --format <selector>', "Video format code or selector (e.g., 'bestvideo+bestaudio')")
    .option('-a, --audio-only', 'Download audio only (MP3)')
    .option('-o, --output <template>', "Output filename template (e.g., '%(title)s.%(ext)s')")
    .option('--subtitles', 'Download subtitles')
    .option('--subtitles-lang <langs>', 'Subtitle languages (comma separated)', DEFAULT_SUBTITLE_LANGS)
    .option('--playlist', 'Download entire playlist (if URL is a playlist)')
    .option('--metadata', 'Add metadata to the file')
    .option('--thumbnail', 'Embed thumbnail in the file')
    .option('--sponsorblock', 'Remove sponsor segments using SponsorBlock')
    .option('--cookies <file>', "Path to Netscape format cookies file (e.g., 'www.youtube.com_cookies.txt')")
    .option('--browser <name>', "Browser to extract cookies from (e.g., 'chrome', 'firefox')")
    .option('-F, --list-formats', 'List available formats for the first URL and exit')
    .option('-i, --interactive', 'Choose options through interactive prompts')
    .option('--verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (urls: string[], options: CliOptions) => {
      await action(urls, options);
    });

  return program;
}

/**
 * --format wins over --audio-only; neither leaves the choice to yt-dlp
 */
export function modeFromOptions(options: CliOptions): DownloadMode {
  const selector = options.format?.trim();
  if (selector) {
    if (options.audioOnly) {
      getLogger().warn('--format takes precedence over --audio-only');
    }
    return { kind: 'format', selector };
  }
  if (options.audioOnly) {
    return { kind: 'audio' };
  }
  return { kind: 'default' };
}

export function buildRequest(urls: string[], options: CliOptions, cookies: CookieSource): DownloadRequest {
  return {
    urls,
    mode: modeFromOptions(options),
    outputTemplate: options.output || undefined,
    subtitles: options.subtitles ? normalizeSubtitleLangs(options.subtitlesLang) : false,
    playlist: options.playlist ?? false,
    metadata: options.metadata ?? false,
    thumbnail: options.thumbnail ?? false,
    sponsorblock: options.sponsorblock ?? false,
    cookies,
  };
}
