import Enquirer from 'enquirer';

export class PromptAbortedError extends Error {
  constructor(options?: ErrorOptions) {
    super('Prompt cancelled', options);
    this.name = this.constructor.name;
  }
}

/**
 * Asks for the music description on an interactive terminal.
 * @throws PromptAbortedError when the user cancels
 */
export async function promptForDescription(): Promise<string> {
  try {
    const answer = await Enquirer.prompt<{ description: string }>({
      type: 'input',
      name: 'description',
      message: 'Describe the track to generate',
      validate: (value: string) => value.trim().length > 0 || 'Description must not be empty',
    });
    return answer.description.trim();
  } catch (error) {
    throw new PromptAbortedError({ cause: error });
  }
}
