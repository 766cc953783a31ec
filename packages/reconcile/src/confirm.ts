import * as readline from 'readline';

/** Asks the operator a yes/no question; resolves true only on an explicit yes. */
export type Confirm = (question: string) => Promise<boolean>;

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === 'yes';
}

export function createReadlineConfirm(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Confirm {
  return async (question) => {
    const rl = readline.createInterface({ input, output });
    try {
      const answer = await new Promise<string>((resolve) => rl.question(question, resolve));
      return isAffirmative(answer);
    } finally {
      rl.close();
    }
  };
}
