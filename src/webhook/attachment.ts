import fs from 'node:fs';
import { Readable } from 'node:stream';
import { InvalidArgumentError } from '../errors.js';

// ---------------------------------------------------------------------------
// Byte sources
// ---------------------------------------------------------------------------

/**
 * Where an attachment's bytes come from. One variant per supported kind;
 * build them with `fromFile`, `fromStream` and `fromBytes`.
 */
export type AttachmentSource =
  | { kind: 'file'; path: string }
  | { kind: 'stream'; stream: Readable }
  | { kind: 'bytes'; data: Uint8Array };

export function fromFile(path: string): AttachmentSource {
  return { kind: 'file', path };
}

export function fromStream(stream: Readable): AttachmentSource {
  return { kind: 'stream', stream };
}

export function fromBytes(data: Uint8Array | string): AttachmentSource {
  return { kind: 'bytes', data: typeof data === 'string' ? Buffer.from(data, 'utf8') : data };
}

// ---------------------------------------------------------------------------
// Attachment
// ---------------------------------------------------------------------------

/**
 * A named file to upload with a message. The byte source is opened lazily by
 * `open()` and may be consumed once; `close()` releases whatever the
 * attachment still holds (file descriptor or stream).
 */
export class Attachment {
  private fd: number | null;
  private stream: Readable | null = null;
  private consumed = false;
  private closed = false;

  /** @internal use `convertAttachment` */
  constructor(
    readonly name: string,
    readonly source: AttachmentSource,
    fd: number | null,
  ) {
    this.fd = fd;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  open(): Readable {
    if (this.closed) {
      throw new InvalidArgumentError(`Attachment "${this.name}" has been closed`);
    }
    if (this.consumed) {
      throw new InvalidArgumentError(`Attachment "${this.name}" has already been consumed`);
    }
    this.consumed = true;

    switch (this.source.kind) {
      case 'file': {
        const fd = this.fd;
        if (fd === null) {
          throw new InvalidArgumentError(`Attachment "${this.name}" has no open file`);
        }
        // The read stream owns the descriptor from here on.
        this.fd = null;
        this.stream = fs.createReadStream(this.source.path, { fd, autoClose: true });
        break;
      }
      case 'stream':
        this.stream = this.source.stream;
        break;
      case 'bytes':
        this.stream = Readable.from([Buffer.from(this.source.data)]);
        break;
    }
    return this.stream;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.stream) {
      this.stream.destroy();
      this.stream = null;
    } else if (this.source.kind === 'stream') {
      this.source.stream.destroy();
    }
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}

// ---------------------------------------------------------------------------
// Converter
// ---------------------------------------------------------------------------

const KNOWN_KINDS = new Set(['file', 'stream', 'bytes']);

function isKnownSource(source: unknown): source is AttachmentSource {
  if (!source || typeof source !== 'object' || !('kind' in source)) return false;
  return typeof source.kind === 'string' && KNOWN_KINDS.has(source.kind);
}

/**
 * Validate a (name, source) pair and wrap it as an Attachment.
 *
 * File sources are opened here so that a missing or unreadable file fails
 * before anything is submitted. No content is read.
 */
export function convertAttachment(name: unknown, source: unknown): Attachment {
  if (typeof name !== 'string') {
    throw new InvalidArgumentError('Attachment name must be a string');
  }
  if (name.trim().length === 0) {
    throw new InvalidArgumentError('Attachment name may not be blank');
  }
  if (source == null) {
    throw new InvalidArgumentError(`Attachment "${name}" has no data`);
  }
  if (!isKnownSource(source)) {
    throw new InvalidArgumentError(
      `Attachment "${name}" has an unsupported data kind; use fromFile, fromStream or fromBytes`,
    );
  }

  if (source.kind !== 'file') {
    return new Attachment(name, source, null);
  }

  let fd: number;
  try {
    fd = fs.openSync(source.path, 'r');
  } catch (err) {
    throw new InvalidArgumentError(`Attachment "${name}" cannot be read from ${source.path}`, { cause: err });
  }
  if (!fs.fstatSync(fd).isFile()) {
    fs.closeSync(fd);
    throw new InvalidArgumentError(`Attachment "${name}" is not a regular file: ${source.path}`);
  }
  return new Attachment(name, source, fd);
}
