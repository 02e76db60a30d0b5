import type { APIEmbed } from 'discord.js';
import { InvalidArgumentError } from '../errors.js';
import { MAX_FILES } from '../limits.js';
import { type Attachment, type AttachmentSource, convertAttachment } from './attachment.js';

/** Anything that serializes to an embed object: discord.js `EmbedBuilder` and `Embed` both do. */
export type EmbedLike = {
  toJSON(): APIEmbed;
};

/** Read-only view of an existing message (a discord.js `Message` fits). */
export type MessageLike = {
  readonly content: string;
  readonly embeds: readonly EmbedLike[];
  readonly tts: boolean;
};

export type AttachmentMap = ReadonlyMap<string, AttachmentSource> | Readonly<Record<string, AttachmentSource>>;

export type WebhookMessageInit = {
  username?: string | null;
  avatarUrl?: string | null;
  content?: string | null;
  embeds?: readonly EmbedLike[];
  tts?: boolean;
  attachments?: readonly Attachment[] | null;
};

function isEmbed(value: EmbedLike | Iterable<EmbedLike>): value is EmbedLike {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function toEmbedList(args: ReadonlyArray<EmbedLike | Iterable<EmbedLike>>): EmbedLike[] {
  if (args.length === 1) {
    const [only] = args;
    if (only == null) {
      throw new InvalidArgumentError('Embeds may not be null');
    }
    if (!isEmbed(only)) return Array.from(only);
  }
  const out: EmbedLike[] = [];
  for (const arg of args) {
    if (arg == null) {
      throw new InvalidArgumentError('Embeds may not contain null');
    }
    if (!isEmbed(arg)) {
      throw new InvalidArgumentError('Pass embeds either as one iterable or as separate arguments');
    }
    out.push(arg);
  }
  return out;
}

function checkEmbeds(embeds: readonly EmbedLike[]): void {
  if (embeds.length === 0) {
    throw new InvalidArgumentError('Embeds may not be empty');
  }
  if (embeds.some((e) => e == null)) {
    throw new InvalidArgumentError('Embeds may not contain null');
  }
}

function checkFileCount(count: number): void {
  if (count === 0) {
    throw new InvalidArgumentError('Attachments may not be empty');
  }
  if (count > MAX_FILES) {
    throw new InvalidArgumentError(`Cannot add more than ${MAX_FILES} files to a message`);
  }
}

/**
 * Convert (name, source) pairs in order, enforcing unique names. Files that
 * were already opened are closed again if a later pair fails.
 */
function convertAll(pairs: ReadonlyArray<readonly [unknown, unknown]>): Attachment[] {
  const out: Attachment[] = [];
  const seen = new Set<string>();
  try {
    for (const [name, data] of pairs) {
      if (typeof name === 'string' && seen.has(name)) {
        throw new InvalidArgumentError(`Duplicate attachment name "${name}"`);
      }
      const attachment = convertAttachment(name, data);
      seen.add(attachment.name);
      out.push(attachment);
    }
  } catch (err) {
    for (const a of out) a.close();
    throw err;
  }
  return out;
}

/**
 * An immutable message for a webhook endpoint.
 *
 * Besides the usual content, embeds and TTS flag, a webhook message can
 * override the sender's display name (`username`) and avatar (`avatarUrl`),
 * and can carry several embeds at once.
 *
 * Create one with `WebhookMessage.embeds`, `WebhookMessage.files`, `WebhookMessage.create`,
 * `WebhookMessage.from`, or `WebhookMessageBuilder`.
 */
export class WebhookMessage {
  readonly username: string | null;
  readonly avatarUrl: string | null;
  readonly content: string | null;
  readonly embeds: readonly EmbedLike[];
  readonly tts: boolean;
  readonly attachments: readonly Attachment[] | null;

  private constructor(init: WebhookMessageInit) {
    this.username = init.username ?? null;
    this.avatarUrl = init.avatarUrl ?? null;
    this.content = init.content ?? null;
    this.embeds = Object.freeze([...(init.embeds ?? [])]);
    this.tts = init.tts ?? false;
    this.attachments = init.attachments ? Object.freeze([...init.attachments]) : null;
    Object.freeze(this);
  }

  /**
   * Message from already-converted parts. Attachments, when given, must hold
   * 1 to `MAX_FILES` slots with uniquely named entries; the encoder stops at
   * the first empty slot, so slot 0 must be filled.
   */
  static create(init: WebhookMessageInit): WebhookMessage {
    if (init.embeds?.some((e) => e == null)) {
      throw new InvalidArgumentError('Embeds may not contain null');
    }
    const attachments = init.attachments ?? null;
    if (attachments !== null) {
      checkFileCount(attachments.length);
      if (attachments[0] == null) {
        throw new InvalidArgumentError('Attachments may not be empty');
      }
      const seen = new Set<string>();
      for (const attachment of attachments) {
        if (attachment == null) continue;
        if (seen.has(attachment.name)) {
          throw new InvalidArgumentError(`Duplicate attachment name "${attachment.name}"`);
        }
        seen.add(attachment.name);
      }
    }
    return new WebhookMessage(init);
  }

  /** Message holding only the given embeds. */
  static embeds(embeds: Iterable<EmbedLike>): WebhookMessage;
  static embeds(...embeds: EmbedLike[]): WebhookMessage;
  static embeds(...args: Array<EmbedLike | Iterable<EmbedLike>>): WebhookMessage {
    const list = toEmbedList(args);
    checkEmbeds(list);
    return new WebhookMessage({ embeds: list });
  }

  /**
   * Message holding only attachments, given as a name → source map or as
   * flat (name, source) pairs:
   *
   * ```ts
   * WebhookMessage.files(new Map([['dog.png', fromFile('./dog.png')]]));
   * WebhookMessage.files('dog.png', fromFile('./dog.png'), 'bird.bin', fromBytes(buf));
   * ```
   *
   * At most `MAX_FILES` attachments. File sources are opened immediately.
   */
  static files(attachments: AttachmentMap): WebhookMessage;
  static files(name1: string, data1: AttachmentSource, ...rest: Array<string | AttachmentSource>): WebhookMessage;
  static files(first: unknown, ...rest: unknown[]): WebhookMessage {
    if (first == null) {
      throw new InvalidArgumentError('Attachments may not be null');
    }

    if (typeof first !== 'string') {
      if (typeof first !== 'object') {
        throw new InvalidArgumentError('Attachments must be a map of name to data');
      }
      const entries: Array<readonly [unknown, unknown]> =
        first instanceof Map ? [...first.entries()] : Object.entries(first);
      checkFileCount(entries.length);
      return new WebhookMessage({ attachments: convertAll(entries) });
    }

    if (first.trim().length === 0) {
      throw new InvalidArgumentError('Attachment name may not be blank');
    }
    const [data1, ...more] = rest;
    if (data1 == null) {
      throw new InvalidArgumentError(`Attachment "${first}" has no data`);
    }
    if (more.length % 2 !== 0) {
      throw new InvalidArgumentError('Must provide even number of arguments');
    }
    checkFileCount(1 + more.length / 2);

    const pairs: Array<readonly [unknown, unknown]> = [[first, data1]];
    for (let i = 0; i < more.length; i += 2) {
      if (typeof more[i] !== 'string') {
        throw new InvalidArgumentError('Provided arguments must be pairs of (name, data)');
      }
      pairs.push([more[i], more[i + 1]]);
    }
    return new WebhookMessage({ attachments: convertAll(pairs) });
  }

  /**
   * Copy content, embeds and the TTS flag from an existing message.
   * Attachments of the source message are not copied.
   */
  static from(message: MessageLike): WebhookMessage {
    if (message == null) {
      throw new InvalidArgumentError('Message may not be null');
    }
    return new WebhookMessage({
      content: message.content,
      embeds: [...message.embeds],
      tts: message.tts,
    });
  }

  /** Whether this message carries attachments (and is sent as multipart). */
  isFile(): boolean {
    return this.attachments !== null;
  }
}
