import {
  cancel,
  intro,
  isCancel,
  log,
  note,
  outro,
  password,
  select,
  spinner,
  text,
} from '@clack/prompts';

export interface TextPrompt {
  message: string;
  placeholder?: string;
  initialValue?: string;
  validate?: (value: string) => string | undefined;
}

export interface SelectOption<T extends string> {
  value: T;
  label: string;
  hint?: string;
}

export interface ProgressIndicator {
  update(message: string): void;
  stop(message: string): void;
}

/**
 * Terminal interaction used by the interactive mode. Every prompt
 * resolves to null when the user cancels it.
 */
export interface Prompter {
  intro(title: string): void;
  outro(message: string): void;
  note(message: string, title?: string): void;
  error(message: string): void;
  cancel(message: string): void;
  text(prompt: TextPrompt): Promise<string | null>;
  password(prompt: { message: string }): Promise<string | null>;
  select<T extends string>(prompt: {
    message: string;
    options: SelectOption<T>[];
  }): Promise<T | null>;
  progress(label: string): ProgressIndicator;
}

export function createClackPrompter(): Prompter {
  return {
    intro: (title) => intro(title),
    outro: (message) => outro(message),
    note: (message, title) => note(message, title),
    error: (message) => log.error(message),
    cancel: (message) => cancel(message),
    text: async (prompt) => {
      const value = await text({
        message: prompt.message,
        placeholder: prompt.placeholder,
        initialValue: prompt.initialValue,
        validate: prompt.validate,
      });
      return isCancel(value) ? null : value;
    },
    password: async (prompt) => {
      const value = await password({ message: prompt.message });
      return isCancel(value) ? null : value;
    },
    select: async (prompt) => {
      const options: { value: string; label: string; hint?: string }[] =
        prompt.options.map((option) => ({
          value: option.value,
          label: option.label,
          hint: option.hint,
        }));
      const value = await select({ message: prompt.message, options });
      if (isCancel(value)) {
        return null;
      }
      return prompt.options.find((option) => option.value === value)?.value ?? null;
    },
    progress: (label) => {
      const spin = spinner();
      spin.start(label);
      return {
        update: (message) => spin.message(message),
        stop: (message) => spin.stop(message),
      };
    },
  };
}
