import * as readline from 'readline/promises'
import { stdin, stdout } from 'process'

export async function ask(prompt: string): Promise<string> {
  const rl = readline.createInterface({ input: stdin, output: stdout })
  try {
    return await rl.question(prompt)
  } finally {
    rl.close()
  }
}

/** Yes/no question; anything but "y"/"yes" is a no */
export async function confirm(prompt: string): Promise<boolean> {
  const answer = await ask(`${prompt} [y/N] `)
  return ['y', 'yes'].includes(answer.trim().toLowerCase())
}

export function isInteractive(): boolean {
  return Boolean(stdin.isTTY && stdout.isTTY)
}
