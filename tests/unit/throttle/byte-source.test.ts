import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { ReadableByteSource } from '../../../src/lib/throttle/byte-source.js';
import { InvalidChunkError } from '../../../src/utils/errors.js';
import { errorOf } from '../../helpers/memory-source.js';

function text(bytes: Uint8Array, count: number): string {
  return Buffer.from(bytes.subarray(0, count)).toString('utf8');
}

describe('ReadableByteSource', () => {
  it('splits chunks across destination-sized reads', async () => {
    const source = new ReadableByteSource(Readable.from([Buffer.from('hello')]));
    const destination = new Uint8Array(2);

    const first = await source.read(destination);
    expect(first).toEqual({ bytesRead: 2, status: 'ok' });
    expect(text(destination, 2)).toBe('he');

    const second = await source.read(destination);
    expect(second).toEqual({ bytesRead: 2, status: 'ok' });
    expect(text(destination, 2)).toBe('ll');

    const third = await source.read(destination);
    expect(third).toEqual({ bytesRead: 1, status: 'ok' });
    expect(text(destination, 1)).toBe('o');

    await expect(source.read(destination)).resolves.toEqual({ bytesRead: 0, status: 'eof' });
    await expect(source.read(destination)).resolves.toEqual({ bytesRead: 0, status: 'eof' });
  });

  it('returns at most one chunk per read', async () => {
    const source = new ReadableByteSource(Readable.from(['ab', 'cd']));
    const destination = new Uint8Array(8);

    await expect(source.read(destination)).resolves.toEqual({ bytesRead: 2, status: 'ok' });
    expect(text(destination, 2)).toBe('ab');
    await expect(source.read(destination)).resolves.toEqual({ bytesRead: 2, status: 'ok' });
    expect(text(destination, 2)).toBe('cd');
  });

  it('skips empty chunks', async () => {
    const source = new ReadableByteSource(Readable.from([Buffer.alloc(0), Buffer.from('x')]));
    const destination = new Uint8Array(4);

    await expect(source.read(destination)).resolves.toEqual({ bytesRead: 1, status: 'ok' });
    expect(text(destination, 1)).toBe('x');
  });

  it('returns zero bytes for an empty destination without pulling', async () => {
    const source = new ReadableByteSource(Readable.from([Buffer.from('x')]));
    await expect(source.read(new Uint8Array(0))).resolves.toEqual({ bytesRead: 0, status: 'ok' });
  });

  it('reports stream errors as error results', async () => {
    const readable = new Readable({
      read() {
        this.destroy(new Error('disk gone'));
      },
    });
    const source = new ReadableByteSource(readable);

    const result = await source.read(new Uint8Array(4));
    expect(result.bytesRead).toBe(0);
    expect(errorOf(result).message).toBe('disk gone');
  });

  it('rejects chunks that are not bytes', async () => {
    const source = new ReadableByteSource(Readable.from([{ id: 1 }]));

    const result = await source.read(new Uint8Array(4));
    expect(errorOf(result)).toBeInstanceOf(InvalidChunkError);
  });

  it('destroys the readable on close', async () => {
    const readable = Readable.from([Buffer.from('abc')]);
    const source = new ReadableByteSource(readable);

    source.close();
    expect(readable.destroyed).toBe(true);
    await expect(source.read(new Uint8Array(4))).resolves.toEqual({ bytesRead: 0, status: 'eof' });
  });
});
