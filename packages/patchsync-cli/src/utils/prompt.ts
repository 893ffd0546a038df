/**
 * Interactive prompts on stdin.
 *
 * In non-interactive environments (piped stdin, CI) yes/no questions resolve
 * to their default and free-text questions fail, since there is nobody to
 * answer them.
 */

import * as readline from 'readline';

/** Reads one line of input after showing the prompt */
export type ReadAnswerFn = (prompt: string) => Promise<string>;

/**
 * Ask a yes/no question. An empty answer means `defaultAnswer`; anything other
 * than y/yes/n/no asks again.
 */
export async function promptYesNo(question: string, defaultAnswer: boolean): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return defaultAnswer;
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  try {
    return await askYesNo(
      question,
      defaultAnswer,
      (prompt) => new Promise((resolve) => rl.question(prompt, resolve))
    );
  } finally {
    rl.close();
  }
}

/**
 * Yes/no loop over a line reader.
 */
export async function askYesNo(
  question: string,
  defaultAnswer: boolean,
  readAnswer: ReadAnswerFn
): Promise<boolean> {
  const hint = defaultAnswer ? '[Y/n]' : '[y/N]';
  for (;;) {
    const parsed = parseYesNo(await readAnswer(`${question} ${hint} `), defaultAnswer);
    if (parsed !== undefined) {
      return parsed;
    }
  }
}

/**
 * Interpret a yes/no reply. Undefined for a reply that is neither.
 */
export function parseYesNo(answer: string, defaultAnswer: boolean): boolean | undefined {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === '') {
    return defaultAnswer;
  }
  if (trimmed === 'y' || trimmed === 'yes') {
    return true;
  }
  if (trimmed === 'n' || trimmed === 'no') {
    return false;
  }
  return undefined;
}

/**
 * Ask for a free-text value.
 */
export function promptInput(question: string): Promise<string> {
  if (!process.stdin.isTTY) {
    return Promise.reject(
      new Error(`Cannot ask "${question}" without an interactive terminal; pass it as a flag`)
    );
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(`${question} `, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}
