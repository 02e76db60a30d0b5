import { InvalidArgumentError } from '../errors.js';
import { MAX_CONTENT_LENGTH, MAX_EMBEDS, MAX_FILES } from '../limits.js';
import { type Attachment, type AttachmentSource, convertAttachment } from './attachment.js';
import { type EmbedLike, type MessageLike, WebhookMessage } from './message.js';

/**
 * Mutable builder for WebhookMessage. Unlike the static factories, it can
 * combine content, embeds and files, and is the way to set the sender
 * overrides (`username`, `avatarUrl`).
 */
export class WebhookMessageBuilder {
  private content = '';
  private embeds: EmbedLike[] = [];
  private files: Attachment[] = [];
  private username: string | null = null;
  private avatarUrl: string | null = null;
  private tts = false;

  /** Start from an existing message's content, embeds and TTS flag. */
  static fromMessage(message: MessageLike): WebhookMessageBuilder {
    if (message == null) {
      throw new InvalidArgumentError('Message may not be null');
    }
    return new WebhookMessageBuilder()
      .setContent(message.content)
      .addEmbeds(message.embeds)
      .setTTS(message.tts);
  }

  isEmpty(): boolean {
    return this.content.length === 0 && this.embeds.length === 0 && this.files.length === 0;
  }

  /** Clears content, embeds and files. Sender overrides and TTS are kept. */
  reset(): this {
    this.content = '';
    this.resetEmbeds();
    this.resetFiles();
    return this;
  }

  resetEmbeds(): this {
    this.embeds = [];
    return this;
  }

  /** Drops every added file, closing any that were already opened. */
  resetFiles(): this {
    for (const file of this.files) file.close();
    this.files = [];
    return this;
  }

  setContent(content: string | null): this {
    const next = content ?? '';
    if (next.length > MAX_CONTENT_LENGTH) {
      throw new InvalidArgumentError(`Content may not exceed ${MAX_CONTENT_LENGTH} characters`);
    }
    this.content = next;
    return this;
  }

  append(text: string): this {
    if (this.content.length + text.length > MAX_CONTENT_LENGTH) {
      throw new InvalidArgumentError(`Content may not exceed ${MAX_CONTENT_LENGTH} characters`);
    }
    this.content += text;
    return this;
  }

  setUsername(username: string | null): this {
    this.username = username == null || username.trim().length === 0 ? null : username.trim();
    return this;
  }

  setAvatarUrl(avatarUrl: string | null): this {
    this.avatarUrl = avatarUrl == null || avatarUrl.trim().length === 0 ? null : avatarUrl.trim();
    return this;
  }

  setTTS(tts: boolean): this {
    this.tts = tts;
    return this;
  }

  addEmbeds(embeds: Iterable<EmbedLike>): this {
    const list = Array.from(embeds);
    if (list.some((e) => e == null)) {
      throw new InvalidArgumentError('Embeds may not contain null');
    }
    if (this.embeds.length + list.length > MAX_EMBEDS) {
      throw new InvalidArgumentError(`Cannot add more than ${MAX_EMBEDS} embeds to a message`);
    }
    this.embeds.push(...list);
    return this;
  }

  addFile(name: string, source: AttachmentSource): this {
    if (this.files.length >= MAX_FILES) {
      throw new InvalidArgumentError(`Cannot add more than ${MAX_FILES} files to a message`);
    }
    if (this.files.some((f) => f.name === name)) {
      throw new InvalidArgumentError(`Duplicate attachment name "${name}"`);
    }
    this.files.push(convertAttachment(name, source));
    return this;
  }

  get fileCount(): number {
    return this.files.length;
  }

  /**
   * Build the message. The builder hands its files over to the message, so
   * building twice without adding new files yields a message without them.
   */
  build(): WebhookMessage {
    if (this.isEmpty()) {
      throw new InvalidArgumentError('Cannot build an empty message');
    }
    const message = WebhookMessage.create({
      username: this.username,
      avatarUrl: this.avatarUrl,
      content: this.content.length > 0 ? this.content : null,
      embeds: this.embeds,
      tts: this.tts,
      attachments: this.files.length > 0 ? this.files : null,
    });
    this.files = [];
    return message;
  }
}
