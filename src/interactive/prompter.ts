import { confirm, intro, isCancel, multiselect, note, outro, select, text } from '@clack/prompts';
import { CancelledError } from '../utils/errors';

export interface Choice<T extends string> {
  value: T;
  label: string;
  hint?: string;
}

export interface TextPrompt {
  message: string;
  initialValue?: string;
  validate?: (value: string) => string | undefined;
}

export interface SelectPrompt<T extends string> {
  message: string;
  choices: readonly Choice<T>[];
}

export interface ConfirmPrompt {
  message: string;
  initialValue: boolean;
}

/**
 * The prompts the interactive flow needs
 * Every method rejects with CancelledError when the user aborts (Ctrl+C / Esc)
 */
export interface Prompter {
  intro(title: string, subtitle?: string): void;
  text(prompt: TextPrompt): Promise<string>;
  select<T extends string>(prompt: SelectPrompt<T>): Promise<T>;
  multiselect<T extends string>(prompt: SelectPrompt<T>): Promise<T[]>;
  confirm(prompt: ConfirmPrompt): Promise<boolean>;
  outro(message: string): void;
}

interface ClackOption {
  value: string;
  label: string;
  hint?: string;
}

function toClackOptions(choices: readonly Choice<string>[]): ClackOption[] {
  return choices.map((choice) => ({ value: choice.value, label: choice.label, hint: choice.hint }));
}

/**
 * Prompter backed by @clack/prompts
 */
export function createClackPrompter(): Prompter {
  return {
    intro(title, subtitle) {
      intro(title);
      if (subtitle) {
        note(subtitle);
      }
    },

    async text(prompt) {
      const answer = await text({
        message: prompt.message,
        initialValue: prompt.initialValue,
        validate: prompt.validate,
      });
      if (isCancel(answer)) {
        throw new CancelledError();
      }
      return answer;
    },

    async select<T extends string>(prompt: SelectPrompt<T>): Promise<T> {
      const answer = await select({
        message: prompt.message,
        options: toClackOptions(prompt.choices),
      });
      const picked = prompt.choices.find((choice) => choice.value === answer);
      if (isCancel(answer) || !picked) {
        throw new CancelledError();
      }
      return picked.value;
    },

    async multiselect<T extends string>(prompt: SelectPrompt<T>): Promise<T[]> {
      const answer = await multiselect({
        message: prompt.message,
        options: toClackOptions(prompt.choices),
        required: false,
      });
      if (isCancel(answer) || !Array.isArray(answer)) {
        throw new CancelledError();
      }
      return prompt.choices
        .filter((choice) => answer.includes(choice.value))
        .map((choice) => choice.value);
    },

    async confirm(prompt) {
      const answer = await confirm({
        message: prompt.message,
        initialValue: prompt.initialValue,
      });
      if (isCancel(answer)) {
        throw new CancelledError();
      }
      return answer;
    },

    outro(message) {
      outro(message);
    },
  };
}
