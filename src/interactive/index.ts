export { runInteractive } from './flow';
export type { InteractiveDeps, InteractiveOutcome } from './flow';
export { createClackPrompter } from './prompter';
export type { Prompter } from './prompter';
