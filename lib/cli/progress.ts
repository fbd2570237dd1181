/**
 * Dynamic CLI Progress Display
 *
 * Shows the running step with an animated spinner, and a progress bar
 * while pages are being read.
 */

import {
  formatProgressEvent,
  formatStepName,
  type Progress,
  type ProgressEvent,
} from "../pipeline/runner";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const BAR_WIDTH = 20;

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface SpinnerProgressOptions {
  stream?: OutputStream;
  /** Animate in place; defaults to whether the stream is a TTY */
  interactive?: boolean;
}

/**
 * Progress emitter for the terminal. Falls back to one plain line per
 * event when the stream is not interactive.
 */
export class SpinnerProgress implements Progress {
  private readonly stream: OutputStream;
  private readonly interactive: boolean;
  private timer: ReturnType<typeof setInterval> | null = null;
  private frame = 0;
  private label = "";
  private current = 0;
  private total = 0;
  private startTime = Date.now();

  constructor(options: SpinnerProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.interactive = options.interactive ?? this.stream.isTTY === true;
  }

  emit(event: ProgressEvent): void {
    if (!this.interactive) {
      this.stream.write(formatProgressEvent(event) + "\n");
      return;
    }

    switch (event.type) {
      case "step-start":
        this.start(`${formatStepName(event.step)}${event.groupId ? ` for ${event.groupId}` : ""}`);
        return;
      case "step-progress":
        if (event.page !== undefined && event.totalPages !== undefined) {
          this.current = event.page;
          this.total = event.totalPages;
        }
        return;
      case "step-complete":
        this.finish(`${GREEN}✔${RESET} ${this.label}  ${DIM}${formatDuration(Date.now() - this.startTime)}${RESET}`);
        return;
      case "step-error":
        this.finish(`${RED}✗${RESET} ${formatProgressEvent(event)}`);
        return;
      case "retry":
      case "warning":
        this.printAbove(`${YELLOW}⚠${RESET} ${formatProgressEvent(event)}`);
        return;
    }
  }

  /**
   * Stop animating and restore the cursor.
   */
  stop(): void {
    if (!this.interactive) return;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.stream.write(`\r${CLEAR_LINE}`);
    }
    this.stream.write(SHOW_CURSOR);
  }

  private start(label: string): void {
    this.stop();
    this.label = label;
    this.current = 0;
    this.total = 0;
    this.frame = 0;
    this.startTime = Date.now();
    this.stream.write(HIDE_CURSOR);
    this.timer = setInterval(() => {
      this.frame++;
      this.render();
    }, 80);
    this.render();
  }

  private finish(line: string): void {
    this.stop();
    this.stream.write(line + "\n");
  }

  private printAbove(line: string): void {
    this.stream.write(`\r${CLEAR_LINE}${line}\n`);
    if (this.timer) this.render();
  }

  private render(): void {
    const spinner = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
    let line = `\r${CLEAR_LINE}${BOLD}${CYAN}${spinner}${RESET} ${this.label}`;
    if (this.total > 0) {
      line += `  ${renderBar(this.current, this.total)}  ${this.current}/${this.total} pages`;
    }
    line += `  ${DIM}${formatDuration(Date.now() - this.startTime)}${RESET}`;
    this.stream.write(line);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function renderBar(current: number, total: number, width = BAR_WIDTH): string {
  const filled = total > 0 ? Math.min(width, Math.round((current / total) * width)) : 0;
  return "█".repeat(filled) + "░".repeat(width - filled);
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}
