/**
 * Types for yt-dlp command construction
 */

export type DownloadMode =
  | { kind: 'default' }
  | { kind: 'video' }
  | { kind: 'audio' }
  | { kind: 'format'; selector: string };

export type CookieSource =
  | { kind: 'none' }
  | { kind: 'file'; path: string }
  | { kind: 'browser'; browser: string };

export interface DownloadRequest {
  urls: string[];
  mode: DownloadMode;
  outputTemplate?: string;
  /** Comma-separated subtitle languages, or false to skip subtitles */
  subtitles: string | false;
  playlist: boolean;
  metadata: boolean;
  thumbnail: boolean;
  sponsorblock: boolean;
  cookies: CookieSource;
}

export interface RunResult {
  exitCode: number;
  signal?: string;
}
