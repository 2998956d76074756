import readline from 'readline';
import { UserCancelledError } from '../errors/index.js';

/**
 * Line-oriented question/answer channel the interactive command talks to.
 */
export interface Prompter {
  /** Ask a question and resolve with the trimmed answer */
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompter over a terminal or a pipe. Lines that arrive before they are asked
 * for are queued, so piped answers are not lost. Ctrl-C, or a closed input
 * stream with no queued answer left, rejects with UserCancelledError.
 */
export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  const queued: string[] = [];
  let pending: { resolve: (answer: string) => void; reject: (error: Error) => void } | null = null;
  let closed = false;

  rl.on('line', line => {
    if (pending) {
      const { resolve } = pending;
      pending = null;
      resolve(line.trim());
    } else {
      queued.push(line.trim());
    }
  });
  rl.on('SIGINT', () => rl.close());
  rl.on('close', () => {
    closed = true;
    if (pending) {
      const { reject } = pending;
      pending = null;
      reject(new UserCancelledError('Interrupted by user.'));
    }
  });

  return {
    ask(question: string): Promise<string> {
      if (closed) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }

      const answer = queued.shift();
      if (answer !== undefined) {
        return Promise.resolve(answer);
      }
      if (closed) {
        return Promise.reject(new UserCancelledError('Input closed.'));
      }
      return new Promise((resolve, reject) => {
        pending = { resolve, reject };
      });
    },
    close(): void {
      pending = null;
      rl.close();
    },
  };
}

/**
 * Prompter that answers from a fixed script, in order.
 * Running out of answers behaves like a closed terminal.
 */
export function createScriptedPrompter(answers: string[]): Prompter & { asked: string[] } {
  const queue = [...answers];
  const asked: string[] = [];

  return {
    asked,
    async ask(question: string): Promise<string> {
      asked.push(question);
      const next = queue.shift();
      if (next === undefined) {
        throw new UserCancelledError('Input closed.');
      }
      return next.trim();
    },
    close(): void {
      queue.length = 0;
    },
  };
}
