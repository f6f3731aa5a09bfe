const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Spinner for a single long step. Falls back to plain lines when stdout is not a terminal.
 */
export class ProgressIndicator {
  private currentFrame = 0;
  private interval: NodeJS.Timeout | undefined;
  private message: string;
  private interactive: boolean;

  constructor(message: string) {
    this.message = message;
    this.interactive = process.stdout.isTTY === true;
  }

  start(): void {
    if (!this.interactive) {
      console.log(`… ${this.message}`);
      return;
    }

    process.stdout.write('\x1B[?25l'); // Hide cursor
    this.interval = setInterval(() => {
      process.stdout.write(`\r${SPINNER_FRAMES[this.currentFrame]} ${this.message}`);
      this.currentFrame = (this.currentFrame + 1) % SPINNER_FRAMES.length;
    }, 100);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(finalMessage?: string): void {
    this.finish(finalMessage === undefined ? undefined : `✅ ${finalMessage}`);
  }

  fail(errorMessage?: string): void {
    this.finish(errorMessage === undefined ? undefined : `❌ ${errorMessage}`);
  }

  private finish(line: string | undefined): void {
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    if (this.interactive) {
      process.stdout.write('\r\x1B[K\x1B[?25h'); // Clear line, show cursor
    }
    if (line !== undefined) {
      console.log(line);
    }
  }
}

/**
 * Per-item counter for batch ingestion
 */
export class ProgressBar {
  private total: number;
  private current = 0;
  private width = 30;

  constructor(total: number) {
    this.total = total;
  }

  tick(label: string): string {
    this.current = Math.min(this.current + 1, this.total);
    const ratio = this.total === 0 ? 1 : this.current / this.total;
    const filled = Math.round(ratio * this.width);
    const bar = '█'.repeat(filled) + '░'.repeat(this.width - filled);
    return `[${bar}] ${this.current}/${this.total} ${label}`;
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}
