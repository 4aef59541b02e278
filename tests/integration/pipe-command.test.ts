/**
 * Pipe Command Tests
 * Copies temporary files through a throttled stream
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describeRate, runPipe } from '../../src/cli/commands/pipe.js';
import { loadThrottleConfig } from '../../src/utils/config-loader.js';
import { FileIOError } from '../../src/utils/errors.js';
import { sequentialBytes } from '../helpers/memory-source.js';

describe('Pipe command', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bytepace-pipe-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should copy a file unthrottled', async () => {
    const data = sequentialBytes(20_000);
    const input = join(dir, 'plain.bin');
    const output = join(dir, 'plain.out');
    await writeFile(input, data);

    const metrics = await runPipe({ input, output, config: loadThrottleConfig() });

    expect(metrics.bytes).toBe(20_000);
    expect(metrics.schedule).toBeUndefined();
    expect(new Uint8Array(await readFile(output))).toEqual(data);
  });

  it('should copy a file at a bounded rate', async () => {
    const data = sequentialBytes(4096);
    const input = join(dir, 'paced.bin');
    const output = join(dir, 'paced.out');
    await writeFile(input, data);

    const metrics = await runPipe({
      input,
      output,
      config: loadThrottleConfig({ rate: '1MB' }),
    });

    expect(metrics.bytes).toBe(4096);
    expect(metrics.schedule).toEqual({
      quota: 105,
      periodMs: 0.1,
      unitsPerSecond: 1_050_000,
    });
    expect(new Uint8Array(await readFile(output))).toEqual(data);
  });

  it('should report a missing input as an I/O error', async () => {
    await expect(
      runPipe({
        input: join(dir, 'missing.bin'),
        output: join(dir, 'missing.out'),
        config: loadThrottleConfig(),
      }),
    ).rejects.toThrow(FileIOError);
  });

  it('should describe the rate for log output', () => {
    expect(describeRate(undefined)).toBe('unthrottled');
    expect(describeRate({ count: 65_536, durationMs: 500 })).toBe('64KB per 500ms');
    expect(describeRate({ count: 1500, durationMs: 1000 })).toBe('1500B per 1000ms');
  });
});
