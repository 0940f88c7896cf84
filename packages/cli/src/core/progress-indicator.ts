/**
 * Spinner and progress bar for long-running commands.
 *
 * Drawn on stderr, and only when stderr is a terminal, so stdout carries
 * nothing but the command's formatted output.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;
const FRAME_INTERVAL_MS = 100;

/**
 * The part of a write stream the spinner needs
 */
export interface SpinnerStream {
  isTTY?: boolean;
  columns?: number;
  write(chunk: string): unknown;
}

export class ProgressIndicator {
  private timer: NodeJS.Timeout | undefined;
  private frame = 0;
  private message = '';

  constructor(private readonly stream: SpinnerStream = process.stderr) {}

  get active(): boolean {
    return this.timer !== undefined;
  }

  start(message: string): void {
    this.stop();
    this.message = message;
    if (!this.stream.isTTY) return;

    this.frame = 0;
    this.draw();
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % FRAMES.length;
      this.draw();
    }, FRAME_INTERVAL_MS);
  }

  /**
   * Replace the message; redraws at once while spinning
   */
  updateMessage(message: string): void {
    this.message = message;
    if (this.active) this.draw();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.stream.write(`\r${' '.repeat(this.stream.columns ?? 80)}\r`);
  }

  fail(message?: string): void {
    const wasActive = this.active;
    this.stop();
    if (wasActive && message) {
      this.stream.write(`✗ ${message}\n`);
    }
  }

  private draw(): void {
    this.stream.write(`\r${FRAMES[this.frame] ?? FRAMES[0]} ${this.message}`);
  }
}

/**
 * `[████░░░░] 50% (1/2)`
 */
export function createProgressBar(current: number, total: number, width = 30): string {
  if (total <= 0) return `[${' '.repeat(width)}] 0%`;

  const ratio = Math.min(1, Math.max(0, current / total));
  const filled = Math.round(ratio * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${Math.round(ratio * 100)}% (${current}/${total})`;
}

/**
 * 850 → "850ms", 1500 → "1.5s", 125000 → "2m 5s"
 */
export function formatElapsedTime(ms: number): string {
  if (ms < 1_000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1_000).toFixed(1)}s`;
  const totalSeconds = Math.floor(ms / 1_000);
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

let shared: ProgressIndicator | undefined;

/**
 * The spinner shared by the executor and the handler it runs
 */
export function getProgressIndicator(): ProgressIndicator {
  if (!shared) {
    shared = new ProgressIndicator();
  }
  return shared;
}

export function resetProgressIndicator(): void {
  shared?.stop();
  shared = undefined;
}
