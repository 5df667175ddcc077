import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { logThought, logToolCall, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  it('redacts key assignments, bearer tokens and prefixed keys', () => {
    expect(scrubSensitiveText('password=test-secret next')).toBe('password=[REDACTED] next');
    expect(scrubSensitiveText('Authorization: Bearer abc.def')).toBe('Authorization: Bearer [REDACTED]');
    expect(scrubSensitiveText('using sk-placeholderplaceholder1234')).toBe('using sk-[REDACTED]');
  });

  it('leaves ordinary text alone', () => {
    expect(scrubSensitiveText('Parallel session n=1 completed')).toBe('Parallel session n=1 completed');
  });
});

describe('daily log', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'subtask-log-'));
    vi.stubEnv('SUBTASK_LOG_DIR', tempDir);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function readLog(): Promise<string> {
    const [file] = await fs.readdir(tempDir);
    expect(file).toMatch(/^\d{4}-\d{2}-\d{2}\.md$/);
    return fs.readFile(path.join(tempDir, file ?? ''), 'utf8');
  }

  it('appends scrubbed, timestamped lines', async () => {
    await logThought('[Delegation] token=test-secret used');

    expect(await readLog()).toMatch(/^- \d{4}-\d{2}-\d{2}T[\d:.]+Z \[Delegation\] token=\[REDACTED\] used\n$/);
  });

  it('records tool calls with their input and output', async () => {
    await logToolCall('set_result@child-1', { summary: 'ok' }, 'accepted');

    expect(await readLog()).toContain('[Tool] set_result@child-1 input={"summary":"ok"} output=accepted');
  });
});
