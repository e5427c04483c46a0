import * as readline from 'node:readline/promises';
import chalk from 'chalk';

/**
 * Interactive terminal used by the login pipeline
 */
export interface UI {
  ask(label: string): Promise<string>;
  askSecret(label: string): Promise<string>;
  say(message: string): void;
  warn(message: string): void;
  /** Confirmation notice after a successful step */
  ok(): void;
}

export interface TerminalStreams {
  input: NodeJS.ReadableStream & {
    isTTY?: boolean;
    setRawMode?(mode: boolean): unknown;
  };
  output: NodeJS.WritableStream;
}

export function entityName(name: string): string {
  return chalk.cyan.bold(name);
}

export class TerminalUI implements UI {
  private rl: readline.Interface | null = null;
  private inputEnded = false;
  private readonly streams: TerminalStreams;

  constructor(streams: Partial<TerminalStreams> = {}) {
    this.streams = {
      input: streams.input ?? process.stdin,
      output: streams.output ?? process.stdout,
    };
  }

  async ask(label: string): Promise<string> {
    const answer = await this.question(label);
    return answer.trim();
  }

  async askSecret(label: string): Promise<string> {
    const { input, output } = this.streams;

    // Piped secrets are taken verbatim
    if (!input.isTTY || !input.setRawMode) {
      return this.question(label);
    }
    if (this.inputEnded) {
      throw new Error('SIGINT');
    }

    // Raw mode reads keys directly; a live readline interface would echo them
    this.close();
    output.write(`${label}> `);
    return this.readSecret(input, output);
  }

  say(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message));
  }

  ok(): void {
    console.log(chalk.green.bold('OK'));
  }

  close(): void {
    const rl = this.rl;
    this.rl = null;
    rl?.close();
  }

  /** Rejects with `SIGINT` when the input ends before a line arrives */
  private question(label: string): Promise<string> {
    if (this.inputEnded) {
      return Promise.reject(new Error('SIGINT'));
    }
    const rl = this.readlineInterface();

    return new Promise((resolve, reject) => {
      let closed = false;
      // Deferred so an answer delivered while closing still wins
      const onClose = () => {
        closed = true;
        queueMicrotask(() => reject(new Error('SIGINT')));
      };
      rl.once('close', onClose);
      rl.question(`${label}> `).then(
        (answer) => {
          rl.removeListener('close', onClose);
          resolve(answer);
        },
        (error: unknown) => {
          rl.removeListener('close', onClose);
          reject(closed ? new Error('SIGINT') : error);
        }
      );
    });
  }

  private readlineInterface(): readline.Interface {
    if (!this.rl) {
      const rl = readline.createInterface({
        input: this.streams.input,
        output: this.streams.output,
        terminal: false,
      });
      rl.once('close', () => {
        // Closed by the stream rather than by close()
        if (this.rl === rl) {
          this.rl = null;
          this.inputEnded = true;
        }
      });
      this.rl = rl;
    }
    return this.rl;
  }

  private readSecret(
    input: TerminalStreams['input'],
    output: NodeJS.WritableStream
  ): Promise<string> {
    return new Promise((resolve, reject) => {
      let secret = '';

      const cleanup = () => {
        input.setRawMode?.(false);
        input.pause();
        input.removeListener('data', onData);
        input.removeListener('end', onEnd);
      };

      const onEnd = () => {
        this.inputEnded = true;
        cleanup();
        output.write('\n');
        reject(new Error('SIGINT'));
      };

      const onData = (key: string | Buffer) => {
        const chunk = typeof key === 'string' ? key : key.toString('utf8');
        for (const char of chunk) {
          const code = char.charCodeAt(0);

          if (code === 3) {
            // Ctrl+C
            cleanup();
            output.write('\n');
            reject(new Error('SIGINT'));
            return;
          } else if (code === 13 || code === 10) {
            // Enter
            cleanup();
            output.write('\n');
            resolve(secret);
            return;
          } else if (code === 127 || code === 8) {
            // Backspace
            secret = secret.slice(0, -1);
          } else if (code >= 32) {
            secret += char;
          }
        }
      };

      input.setRawMode?.(true);
      input.setEncoding('utf8');
      input.on('data', onData);
      input.once('end', onEnd);
      input.resume();
    });
  }
}
