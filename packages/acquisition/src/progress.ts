/**
 * Progress Bar
 * 
 * Single-line transfer progress for interactive terminals:
 * `####------ ...  42.0%`, redrawn in place with a carriage return.
 */

export const PROGRESS_BAR_WIDTH = 70;

export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export function renderProgressBar(doneBytes: number, totalBytes: number): string {
  const percent = 100 * (doneBytes / totalBytes);
  const filled = Math.min(Math.floor((PROGRESS_BAR_WIDTH * doneBytes) / totalBytes), PROGRESS_BAR_WIDTH);
  const bar = '#'.repeat(filled).padEnd(PROGRESS_BAR_WIDTH, '-');
  return `${bar} ${percent.toFixed(1).padStart(5)}%`;
}

export class ProgressBar {
  readonly enabled: boolean;

  constructor(
    private readonly stream: ProgressStream,
    private readonly totalBytes: number
  ) {
    this.enabled = stream.isTTY === true && totalBytes > 0;
  }

  render(doneBytes: number): void {
    if (this.enabled) {
      this.stream.write(`\r${renderProgressBar(doneBytes, this.totalBytes)}`);
    }
  }

  finish(): void {
    if (this.enabled) {
      this.stream.write('\n');
    }
  }
}
