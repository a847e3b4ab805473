import { createInterface } from 'node:readline/promises';

/** Line-based question/answer source for the interactive menu */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    async ask(question: string): Promise<string> {
      if (closed) throw new InputClosedError();
      return rl.question(question);
    },
    close(): void {
      rl.close();
    },
  };
}
