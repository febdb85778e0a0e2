import {
  confirm as confirmPrompt,
  input as inputPrompt,
  select as selectPrompt
} from '@inquirer/prompts';

export interface SelectChoice<T> {
  name: string;
  value: T;
  description?: string;
  disabled?: boolean | string;
}

export interface PromptAdapter {
  select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T>;
  confirm(options: {
    message: string;
    defaultValue?: boolean;
  }): Promise<boolean>;
  input(options: {
    message: string;
    defaultValue?: string;
  }): Promise<string>;
}

export const interactivePromptAdapter: PromptAdapter = {
  async select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T> {
    return selectPrompt({
      message: options.message,
      choices: options.choices,
      pageSize: options.pageSize,
      default: options.defaultValue
    });
  },

  async confirm(options): Promise<boolean> {
    return confirmPrompt({
      message: options.message,
      default: options.defaultValue
    });
  },

  async input(options): Promise<string> {
    return inputPrompt({
      message: options.message,
      default: options.defaultValue
    });
  }
};

/**
 * Re-asks until `validate` accepts the normalized answer. Rejections are
 * printed so the user sees why.
 */
export async function inputValidated(
  prompt: PromptAdapter,
  options: {
    message: string;
    defaultValue?: string;
    normalize?: (value: string) => string;
    validate?: (value: string) => string | undefined;
  }
): Promise<string> {
  while (true) {
    const raw = await prompt.input({
      message: options.message,
      defaultValue: options.defaultValue
    });

    const normalized = options.normalize ? options.normalize(raw) : raw.trim();
    const errorMessage = options.validate ? options.validate(normalized) : undefined;
    if (!errorMessage) {
      return normalized;
    }

    console.log(errorMessage);
  }
}
