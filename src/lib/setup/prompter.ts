import type {Prompter, PromptOptions} from './types.js'
import process from 'node:process'
import {createInterface} from 'node:readline/promises'

/**
 * Reads one line of input after writing the question.
 */
export type LineReader = (question: string) => Promise<string>

/**
 * Build a Prompter on top of a line reader. Blank answers resolve to the
 * default when one is given; required questions are asked again until the
 * answer is non-blank.
 */
export function createPrompter(readLine: LineReader): Prompter {
  const ask = async (question: string, options: PromptOptions = {}): Promise<string> => {
    for (;;) {
      const answer = (await readLine(question)).trim()
      if (answer.length > 0) {
        return answer
      }
      if (options.defaultValue != null) {
        return options.defaultValue
      }
      if (options.required !== true) {
        return ''
      }
    }
  }

  return {
    ask,
    waitForEnter: async (message: string): Promise<void> => {
      await readLine(message)
    },
  }
}

export function createTerminalLineReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): LineReader {
  return async (question: string): Promise<string> => {
    const rl = createInterface({input, output})
    try {
      return await new Promise<string>((resolve, reject) => {
        rl.once('close', () => reject(new Error('Input closed before an answer was given')))
        rl.question(question).then(resolve, reject)
      })
    } finally {
      rl.close()
    }
  }
}

export function createTerminalPrompter(): Prompter {
  return createPrompter(createTerminalLineReader())
}
