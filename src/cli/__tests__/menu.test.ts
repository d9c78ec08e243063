/**
 * Interactive Menu Tests
 */

import { SourceType } from '../../lib/proxy';
import { MENU_OPTIONS, RotatorMenu, describeProxy, renderMenu } from '../menu';
import { createTestService } from '../../__tests__/helpers/service';
import { makeRecord } from '../../__tests__/helpers/fixtures';

function createPrompt(answers: Array<string | null>) {
  return { question: jest.fn(async (_text: string) => answers.shift() ?? null) };
}

describe('menu rendering', () => {
  it('should number every option', () => {
    const lines = renderMenu().split('\n');

    expect(lines).toHaveLength(MENU_OPTIONS.length + 3);
    expect(lines[3]).toBe('1. 🌐 Fetch new proxies');
    expect(lines[lines.length - 1]).toBe('16. 🚪 Exit');
  });

  it('should describe a proxy', () => {
    expect(describeProxy(makeRecord({ latencyMs: undefined }))).toEqual([
      '🔌 Current Proxy: 10.0.0.1:8080',
      '📡 Protocol: HTTP',
      '🌍 Location: US',
      '📶 Your IP: N/A',
      '⏱  Latency: N/A',
    ]);
  });
});

describe('RotatorMenu', () => {
  let context: ReturnType<typeof createTestService>;

  beforeEach(() => {
    context = createTestService({
      probes: { '10.0.0.2:1080': { working: true, observedIp: '203.0.113.2', latencyMs: 90 } },
    });
  });

  afterEach(async () => {
    await context.service.shutdown();
  });

  it('should close on exit and keep going on unknown input', async () => {
    const menu = new RotatorMenu(context.service, createPrompt([]));

    expect(await menu.handle('16')).toBe(false);
    expect(await menu.handle('99')).toBe(true);
  });

  it('should fetch proxies', async () => {
    const menu = new RotatorMenu(context.service, createPrompt([]));

    await menu.handle('1');

    expect(context.service.pool.getPool()).toHaveLength(2);
  });

  it('should start rotation with parsed durations', async () => {
    const menu = new RotatorMenu(context.service, createPrompt(['30s', '0']));

    await menu.handle('3');

    expect(context.service.snapshot().rotation).toMatchObject({ active: true, intervalSeconds: 30, endTime: undefined });
  });

  it('should switch to a custom file source', async () => {
    const menu = new RotatorMenu(context.service, createPrompt(['3', '/data/proxies.txt']));

    await menu.handle('14');

    expect(context.service.getSource()).toEqual({ type: SourceType.CUSTOM_FILE, path: '/data/proxies.txt' });
  });

  it('should report operation errors and continue', async () => {
    context.configurator.failWith = new Error('permission denied');
    const menu = new RotatorMenu(context.service, createPrompt([]));

    expect(await menu.handle('2')).toBe(true);
    expect(context.service.getCurrentProxy()).toBeUndefined();
  });

  it('should add the current proxy to favorites', async () => {
    const menu = new RotatorMenu(context.service, createPrompt(['a']));
    await menu.handle('2');

    await menu.handle('6');

    expect(context.service.listFavorites().map(entry => entry.host)).toEqual(['10.0.0.2']);
  });

  it('should run until input ends', async () => {
    const prompt = createPrompt(['1']);
    const menu = new RotatorMenu(context.service, prompt);

    await menu.run();

    expect(prompt.question).toHaveBeenCalledTimes(2);
    expect(context.service.pool.getPool()).toHaveLength(2);
  });
});
