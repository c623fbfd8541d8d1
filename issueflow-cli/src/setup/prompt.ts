import * as readline from 'readline';
import { Writable } from 'stream';

/**
 * Interactive questions asked by the setup wizard. Tests script the answers.
 */
export interface Prompter {
  question(prompt: string): Promise<string>;
  /** Like `question`, without echoing what is typed. */
  secret(prompt: string): Promise<string>;
  confirm(prompt: string, defaultValue: boolean): Promise<boolean>;
  close(): void;
}

export function createReadlinePrompter(): Prompter {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) {
        process.stdout.write(chunk);
      }
      callback();
    },
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output,
    terminal: true,
  });

  const question = (prompt: string): Promise<string> => {
    return new Promise((resolve) => {
      rl.question(prompt, (answer) => resolve(answer.trim()));
    });
  };

  return {
    question,

    async secret(prompt) {
      process.stdout.write(prompt);
      muted = true;
      try {
        return await question('');
      } finally {
        muted = false;
        process.stdout.write('\n');
      }
    },

    async confirm(prompt, defaultValue) {
      const defaultStr = defaultValue ? 'Y/n' : 'y/N';
      const answer = await question(`${prompt} [${defaultStr}]: `);
      if (!answer) return defaultValue;
      return answer.toLowerCase().startsWith('y');
    },

    close() {
      rl.close();
    },
  };
}
