/**
 * Rotation utilities
 */

/**
 * Sleep that ends early when the signal aborts. Resolves true if the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Parse "30s", "5m", "2h" or a bare number of seconds. Invalid input falls back to 300.
 */
export function parseDuration(value: string, fallback: number = 300): number {
  const match = /^(\d+)\s*([smh]?)$/i.exec(value.trim());
  if (!match) {
    return fallback;
  }

  const amount = parseInt(match[1], 10);
  switch (match[2].toLowerCase()) {
    case 'm':
      return amount * 60;
    case 'h':
      return amount * 3600;
    default:
      return amount;
  }
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds} seconds`;
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)} minutes`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours} hours ${minutes} minutes`;
}
