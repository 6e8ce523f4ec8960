import inquirer from 'inquirer';

/**
 * Yes/no question on the terminal, defaulting to "no"
 */
export async function confirmPrompt(message: string): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message,
      default: false,
    },
  ]);
  return proceed;
}
