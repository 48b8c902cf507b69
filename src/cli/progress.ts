/**
 * @fileoverview Terminal output helpers for CLI commands
 */

// Spinner frames for text-based spinner
const SPINNER_FRAMES = ['|', '/', '-', '\\'];
const SPINNER_INTERVAL_MS = 100;

export interface SpinnerHandle {
  update(message: string): void;
  succeed(message?: string): void;
  fail(message?: string): void;
  stop(): void;
}

/** Spinner on stderr, so streamed answers on stdout stay clean. */
export function createSpinner(initialMessage: string, stream: NodeJS.WriteStream = process.stderr): SpinnerHandle {
  let frameIndex = 0;
  let message = initialMessage;
  let running = true;
  const interactive = stream.isTTY === true;

  const render = (): void => {
    if (!running || !interactive) return;
    const frame = SPINNER_FRAMES[frameIndex % SPINNER_FRAMES.length];
    stream.write(`\r${frame} ${message}`);
    frameIndex++;
  };

  // Clear current line
  const clearLine = (): void => {
    if (interactive) stream.write('\r' + ' '.repeat(message.length + 4) + '\r');
  };

  const intervalId = interactive ? setInterval(render, SPINNER_INTERVAL_MS) : null;
  render();

  const finish = (): void => {
    running = false;
    if (intervalId) clearInterval(intervalId);
    clearLine();
  };

  return {
    update(newMessage: string): void {
      clearLine();
      message = newMessage;
      render();
    },

    succeed(finalMessage?: string): void {
      finish();
      stream.write(`[OK] ${finalMessage || message}\n`);
    },

    fail(finalMessage?: string): void {
      finish();
      stream.write(`[FAIL] ${finalMessage || message}\n`);
    },

    stop(): void {
      finish();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatPercent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/**
 * Key-value lines, keys padded to the longest one
 */
export function formatKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): string[] {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));
  return items.map((item) => {
    const value = item.value === null ? 'N/A' : String(item.value);
    return `  ${item.key.padEnd(maxKeyLength)}: ${value}`;
  });
}

export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  for (const line of formatKeyValue(items)) console.log(line);
}
