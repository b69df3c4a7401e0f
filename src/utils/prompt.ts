import * as readline from 'readline'
import { CONFIRM_ANSWER } from '../constants.js'

/**
 * Interactive input used by the patch workflow
 */
export interface Prompter {
  /** Resolves true only when the answer is exactly "y" */
  confirm(question: string): Promise<boolean>
  /** Free-text answer; empty when the user just presses Enter */
  ask(question: string): Promise<string>
}

export interface TerminalPrompterOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

export function isConfirmation(answer: string): boolean {
  return answer === CONFIRM_ANSWER
}

/**
 * Prompter backed by the terminal. Blocks until a line is entered.
 */
export function createTerminalPrompter(
  options: TerminalPrompterOptions = {},
): Prompter {
  const input = options.input ?? process.stdin
  const output = options.output ?? process.stdout

  function ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input, output })

    return new Promise(resolve => {
      // Input ended without an answer (EOF, closed pipe): treat as empty
      rl.once('close', () => resolve(''))
      rl.question(question, answer => {
        resolve(answer)
        rl.close()
      })
    })
  }

  return {
    ask,
    confirm: async question => isConfirmation(await ask(question)),
  }
}
