/**
 * CLI argument parsing types
 */

export interface CliOptions {
  format?: string;
  audioOnly?: boolean;
  output?: string;
  subtitles?: boolean;
  subtitlesLang: string;
  playlist?: boolean;
  metadata?: boolean;
  thumbnail?: boolean;
  sponsorblock?: boolean;
  cookies?: string;
  browser?: string;
  listFormats?: boolean;
  interactive?: boolean;
  verbose?: boolean;
}

export type CliAction = (urls: string[], options: CliOptions) => Promise<void>;
