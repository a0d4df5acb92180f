/**
 * Terminal spinner for plain output mode. Draws on a TTY stream only;
 * elsewhere start() prints the message once.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private message: string;
  private currentFrame = 0;
  private readonly stream: NodeJS.WriteStream;

  constructor(message: string = 'Loading...', stream: NodeJS.WriteStream = process.stderr) {
    this.message = message;
    this.stream = stream;
  }

  start(): void {
    if (this.intervalId) {
      return;
    }
    if (!this.stream.isTTY) {
      this.stream.write(`${this.message}\n`);
      return;
    }

    this.currentFrame = 0;
    this.stream.write('\x1B[?25l');
    this.intervalId = setInterval(() => {
      this.stream.write(`\r${FRAMES[this.currentFrame % FRAMES.length]} ${this.message}`);
      this.currentFrame++;
    }, 80);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(): void {
    if (!this.intervalId) {
      return;
    }
    clearInterval(this.intervalId);
    this.intervalId = null;
    this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
    this.stream.write('\x1B[?25h');
  }
}
