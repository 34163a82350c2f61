import inquirer from 'inquirer';

export interface PromptOptions {
  nonInteractive?: boolean;
}

/**
 * Whether prompts may be shown: not disabled by flag, and stdin is a terminal.
 */
export function canPrompt(options: PromptOptions = {}): boolean {
  return !options.nonInteractive && !!process.stdin.isTTY;
}

/**
 * Asks for the directory to dump. Falls back to `defaultRoot` when prompting is
 * not possible or the answer is blank.
 */
export async function promptForRoot(
  defaultRoot: string,
  options: PromptOptions = {},
): Promise<string> {
  if (!canPrompt(options)) {
    return defaultRoot;
  }

  const response = await inquirer.prompt<{ root: string }>([
    {
      type: 'input',
      name: 'root',
      message: 'Directory to dump',
      default: defaultRoot,
    },
  ]);

  const answer = response.root.trim();
  return answer || defaultRoot;
}
