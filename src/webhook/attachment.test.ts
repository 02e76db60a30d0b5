import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { InvalidArgumentError } from '../errors.js';
import { convertAttachment, fromBytes, fromFile, fromStream } from './attachment.js';

async function drain(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'courier-attachment-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('convertAttachment', () => {
  it('wraps raw bytes and yields them once', async () => {
    const attachment = convertAttachment('bird.bin', fromBytes(Buffer.from([1, 2, 3])));
    expect(attachment.name).toBe('bird.bin');
    expect(attachment.isConsumed).toBe(false);

    const bytes = await drain(attachment.open());
    expect([...bytes]).toEqual([1, 2, 3]);
    expect(attachment.isConsumed).toBe(true);
    expect(() => attachment.open()).toThrow('Attachment "bird.bin" has already been consumed');
  });

  it('encodes string bytes as utf8', async () => {
    const attachment = convertAttachment('note.txt', fromBytes('héllo'));
    expect((await drain(attachment.open())).toString('utf8')).toBe('héllo');
  });

  it('passes an open stream through unchanged', async () => {
    const stream = Readable.from([Buffer.from('cat'), Buffer.from('nip')]);
    const attachment = convertAttachment('cat.txt', fromStream(stream));
    const opened = attachment.open();
    expect(opened).toBe(stream);
    expect((await drain(opened)).toString()).toBe('catnip');
  });

  it('opens files eagerly and reads them lazily', async () => {
    const file = path.join(tmpDir, 'dog.png');
    await fs.writeFile(file, 'woof');
    const attachment = convertAttachment('dog.png', fromFile(file));

    // Content is read at open(), not at conversion.
    await fs.writeFile(file, 'WOOF');
    expect((await drain(attachment.open())).toString()).toBe('WOOF');
  });

  it('fails at conversion time for a nonexistent file', () => {
    const missing = path.join(tmpDir, 'nope.png');
    let caught: unknown;
    try {
      convertAttachment('nope.png', fromFile(missing));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidArgumentError);
    if (!(caught instanceof InvalidArgumentError)) return;
    expect(caught.code).toBe('INVALID_ARGUMENT');
    const cause = caught.cause;
    expect(cause && typeof cause === 'object' && 'code' in cause ? cause.code : null).toBe('ENOENT');
  });

  it('rejects directories', () => {
    expect(() => convertAttachment('dir', fromFile(tmpDir))).toThrow(InvalidArgumentError);
  });

  it('rejects blank and non-string names', () => {
    expect(() => convertAttachment('  ', fromBytes('x'))).toThrow('Attachment name may not be blank');
    expect(() => convertAttachment(42, fromBytes('x'))).toThrow('Attachment name must be a string');
  });

  it('rejects null and unsupported data', () => {
    expect(() => convertAttachment('a', null)).toThrow('Attachment "a" has no data');
    expect(() => convertAttachment('a', Buffer.from('raw'))).toThrow(InvalidArgumentError);
    expect(() => convertAttachment('a', { kind: 'url', url: 'https://example.com' })).toThrow(
      'unsupported data kind',
    );
  });

  it('close releases an unopened file and blocks later opens', async () => {
    const file = path.join(tmpDir, 'a.txt');
    await fs.writeFile(file, 'a');
    const attachment = convertAttachment('a.txt', fromFile(file));
    attachment.close();
    attachment.close();
    expect(attachment.isClosed).toBe(true);
    expect(() => attachment.open()).toThrow('Attachment "a.txt" has been closed');
  });

  it('close destroys an unconsumed source stream', () => {
    const stream = Readable.from(['x']);
    const attachment = convertAttachment('x', fromStream(stream));
    attachment.close();
    expect(stream.destroyed).toBe(true);
  });
});
