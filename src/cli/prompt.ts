/**
 * Yes/no questions on the terminal.
 */
import * as readline from 'node:readline';

export class Prompter {
  private rl: readline.Interface | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = readline.createInterface({ input: this.input, output: this.output });
    }
    const rl = this.rl;
    return new Promise((resolve) => {
      rl.question(question, resolve);
    });
  }

  /**
   * Ask a yes/no question. An empty answer takes the default.
   */
  async confirm(question: string, defaultValue: boolean = true): Promise<boolean> {
    const hint = defaultValue ? '(Y/n)' : '(y/N)';
    const answer = (await this.ask(`${question} ${hint} `)).trim().toLowerCase();
    if (answer === '') {
      return defaultValue;
    }
    return answer === 'y' || answer === 'yes';
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
