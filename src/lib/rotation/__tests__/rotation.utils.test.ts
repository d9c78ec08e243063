/**
 * Rotation Utilities Tests
 */

import { formatDuration, parseDuration, sleep } from '..';

describe('parseDuration', () => {
  it.each([
    ['30s', 30],
    ['5m', 300],
    ['2h', 7200],
    ['45', 45],
    ['0', 0],
    [' 10 M ', 600],
  ])('should parse %p as %p seconds', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it('should fall back to 300 seconds on invalid input', () => {
    expect(parseDuration('soon')).toBe(300);
    expect(parseDuration('')).toBe(300);
    expect(parseDuration('-5m')).toBe(300);
    expect(parseDuration('1.5h')).toBe(300);
  });
});

describe('formatDuration', () => {
  it('should pick the largest sensible unit', () => {
    expect(formatDuration(45)).toBe('45 seconds');
    expect(formatDuration(300)).toBe('5 minutes');
    expect(formatDuration(3600)).toBe('1 hours 0 minutes');
    expect(formatDuration(5430)).toBe('1 hours 30 minutes');
  });
});

describe('sleep', () => {
  it('should resolve true when the delay elapses', async () => {
    expect(await sleep(5)).toBe(true);
  });

  it('should resolve false as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    expect(await sleep(10000, controller.signal)).toBe(false);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should resolve false immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await sleep(10000, controller.signal)).toBe(false);
  });
});
