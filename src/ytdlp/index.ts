/**
 * yt-dlp command construction and invocation
 */

export { createYtDlpRunner, listFormats } from './runner';
export type { ToolRunner } from './runner';
export type { CookieSource, DownloadMode, DownloadRequest, RunResult } from './types';
