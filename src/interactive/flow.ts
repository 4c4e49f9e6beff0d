/**
 * Interactive download flow
 * Asks for URLs, download type, authentication, output template and extras,
 * then hands a DownloadRequest to runDownload once the user confirms
 */

import { getLogger } from '../utils/logger';
import { runDownload } from '../core/index';
import { SUPPORTED_BROWSERS } from '../cookies/discovery';
import {
  DEFAULT_CUSTOM_FORMAT,
  DEFAULT_OUTPUT_TEMPLATE,
  DEFAULT_SUBTITLE_LANGS,
  normalizeSubtitleLangs,
  splitUrls,
} from '../ytdlp/args';
import { listFormats } from '../ytdlp/runner';
import type { ToolRunner } from '../ytdlp/runner';
import type { CookieSource, DownloadMode, DownloadRequest } from '../ytdlp/types';
import type { Choice, Prompter } from './prompter';

export type DownloadType = 'video' | 'audio' | 'custom' | 'list';
export type ExtraOption = 'subtitles' | 'playlist' | 'metadata' | 'thumbnail' | 'sponsorblock';

export const DOWNLOAD_TYPE_CHOICES: readonly Choice<DownloadType>[] = [
  { value: 'video', label: 'Video (best quality)' },
  { value: 'audio', label: 'Audio only (MP3)' },
  { value: 'custom', label: 'Custom format selection' },
  { value: 'list', label: 'List available formats first' },
];

export const EXTRA_OPTION_CHOICES: readonly Choice<ExtraOption>[] = [
  { value: 'subtitles', label: 'Download subtitles' },
  { value: 'playlist', label: 'Download entire playlist' },
  { value: 'metadata', label: 'Add metadata' },
  { value: 'thumbnail', label: 'Embed thumbnail' },
  { value: 'sponsorblock', label: 'Remove sponsor segments (SponsorBlock)' },
];

export interface InteractiveDeps {
  prompter: Prompter;
  runner: ToolRunner;
  /** Cookies file found next to the user, if any */
  cookiesFile: string | null;
}

export type InteractiveOutcome = 'downloaded' | 'declined';

function requireUrl(value: string): string | undefined {
  return splitUrls(value).length === 0 ? 'Please enter at least one URL' : undefined;
}

class InteractiveSession {
  private useCookiesFile: boolean | null = null;

  constructor(private readonly deps: InteractiveDeps) {}

  async promptUrls(): Promise<string[]> {
    const answer = await this.deps.prompter.text({
      message: 'Enter video URL(s), separate multiple URLs with spaces:',
      validate: requireUrl,
    });
    return splitUrls(answer);
  }

  promptDownloadType(): Promise<DownloadType> {
    return this.deps.prompter.select({
      message: 'What would you like to download?',
      choices: DOWNLOAD_TYPE_CHOICES,
    });
  }

  /**
   * Asked at most once per session; false without asking when no cookies file was found
   */
  async promptUseCookiesFile(): Promise<boolean> {
    const { cookiesFile, prompter } = this.deps;
    if (!cookiesFile) {
      return false;
    }
    if (this.useCookiesFile === null) {
      this.useCookiesFile = await prompter.confirm({
        message: `Found cookies file at '${cookiesFile}'. Use it for authentication?`,
        initialValue: true,
      });
    }
    return this.useCookiesFile;
  }

  async promptCookieSource(): Promise<CookieSource> {
    const { cookiesFile, prompter } = this.deps;
    if (cookiesFile && (await this.promptUseCookiesFile())) {
      return { kind: 'file', path: cookiesFile };
    }

    const useBrowser = await prompter.confirm({
      message: 'Do you want to use browser cookies instead?',
      initialValue: false,
    });
    if (!useBrowser) {
      return { kind: 'none' };
    }

    const browser = await prompter.select({
      message: 'Select browser to extract cookies from:',
      choices: SUPPORTED_BROWSERS.map((name) => ({ value: name, label: name })),
    });
    return { kind: 'browser', browser };
  }

  /**
   * Keep offering the format listing until a real download type is picked
   */
  async promptDownloadKind(firstUrl: string): Promise<Exclude<DownloadType, 'list'>> {
    const { runner, cookiesFile } = this.deps;

    for (;;) {
      const type = await this.promptDownloadType();
      if (type !== 'list') {
        return type;
      }
      const cookies: CookieSource =
        cookiesFile && (await this.promptUseCookiesFile())
          ? { kind: 'file', path: cookiesFile }
          : { kind: 'none' };
      await listFormats(runner, firstUrl, cookies);
    }
  }

  async promptMode(firstUrl: string): Promise<DownloadMode> {
    const type = await this.promptDownloadKind(firstUrl);

    switch (type) {
      case 'video':
        return { kind: 'video' };
      case 'audio':
        return { kind: 'audio' };
      case 'custom': {
        const selector = await this.deps.prompter.text({
          message: "Enter format code (e.g., 'bestvideo+bestaudio', '22+bestaudio'):",
          initialValue: DEFAULT_CUSTOM_FORMAT,
        });
        const trimmed = selector.trim();
        return trimmed ? { kind: 'format', selector: trimmed } : { kind: 'default' };
      }
    }
  }

  async promptOutputTemplate(): Promise<string> {
    const template = await this.deps.prompter.text({
      message: 'Output filename template (leave empty for default):',
      initialValue: DEFAULT_OUTPUT_TEMPLATE,
    });
    return template.trim();
  }

  promptExtraOptions(): Promise<ExtraOption[]> {
    return this.deps.prompter.multiselect({
      message: 'Select additional options:',
      choices: EXTRA_OPTION_CHOICES,
    });
  }

  async promptSubtitleLangs(): Promise<string> {
    const langs = await this.deps.prompter.text({
      message: "Enter subtitle languages (comma separated, e.g., 'en,es'):",
      initialValue: DEFAULT_SUBTITLE_LANGS,
    });
    return normalizeSubtitleLangs(langs);
  }
}

/**
 * Walk the user through every prompt and return the resulting request
 * Returns null when the user declines the final confirmation
 */
export async function collectRequest(deps: InteractiveDeps): Promise<DownloadRequest | null> {
  const session = new InteractiveSession(deps);

  const urls = await session.promptUrls();
  const mode = await session.promptMode(urls[0]);
  const cookies = await session.promptCookieSource();
  const outputTemplate = await session.promptOutputTemplate();
  const extras = await session.promptExtraOptions();
  const subtitles = extras.includes('subtitles') ? await session.promptSubtitleLangs() : false;

  const confirmed = await deps.prompter.confirm({
    message: 'Start download with these settings?',
    initialValue: true,
  });
  if (!confirmed) {
    return null;
  }

  return {
    urls,
    mode,
    outputTemplate: outputTemplate || undefined,
    subtitles,
    playlist: extras.includes('playlist'),
    metadata: extras.includes('metadata'),
    thumbnail: extras.includes('thumbnail'),
    sponsorblock: extras.includes('sponsorblock'),
    cookies,
  };
}

export async function runInteractive(deps: InteractiveDeps): Promise<InteractiveOutcome> {
  const { prompter, runner } = deps;

  // Fail before asking anything if yt-dlp is missing
  await runner.checkInstalled();

  prompter.intro('YouTube Video Downloader', 'Interactive CLI for downloading videos from YouTube');

  const request = await collectRequest(deps);
  if (!request) {
    prompter.outro('Download canceled.');
    return 'declined';
  }

  getLogger().debug(`Collected ${request.urls.length} URL(s) from prompts`);
  await runDownload(request, runner, { verifyInstalled: false });
  return 'downloaded';
}
