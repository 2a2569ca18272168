/**
 * Interactive prompts (inquirer)
 */

import inquirer from 'inquirer'

export async function confirm(message: string, defaultValue: boolean = false): Promise<boolean> {
  const { result } = await inquirer.prompt<{ result: boolean }>([
    {
      type: 'confirm',
      name: 'result',
      message,
      default: defaultValue,
    },
  ])
  return result
}
