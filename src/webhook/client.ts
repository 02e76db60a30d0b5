import { InvalidArgumentError, toError } from '../errors.js';
import { MAX_CONTENT_LENGTH } from '../limits.js';
import { type LoggerLike, silentLogger } from '../logging/logger-like.js';
import { FetchDispatcher } from '../requests/fetch-dispatcher.js';
import { RequestFuture } from '../requests/request-future.js';
import type { CancelHandle, Dispatcher, DispatchResponse, RequestDescriptor } from '../requests/types.js';
import { type EmbedLike, WebhookMessage } from './message.js';
import { type WireBody, describeWireBody, encodeMessage } from './payload.js';

// ---------------------------------------------------------------------------
// Webhook URLs
// ---------------------------------------------------------------------------

const WEBHOOK_HOSTS = new Set([
  'discord.com',
  'discordapp.com',
  'canary.discord.com',
  'ptb.discord.com',
  'canary.discordapp.com',
  'ptb.discordapp.com',
]);

const WEBHOOK_PATH_RE = /^\/api(?:\/v\d+)?\/webhooks\/(\d{15,25})\/([\w-]+)\/?$/;

export type WebhookTarget = {
  id: string;
  token: string;
  /** Normalized execute URL without query string. */
  url: string;
};

/** Parse `https://discord.com/api/webhooks/<id>/<token>` (and its host/version variants). */
export function parseWebhookUrl(raw: string): WebhookTarget {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw new InvalidArgumentError('Webhook URL is not a valid URL');
  }
  if (parsed.protocol !== 'https:' || !WEBHOOK_HOSTS.has(parsed.hostname)) {
    throw new InvalidArgumentError(`Webhook URL must be an https Discord URL, got host "${parsed.hostname}"`);
  }
  const match = WEBHOOK_PATH_RE.exec(parsed.pathname);
  if (!match) {
    throw new InvalidArgumentError('Webhook URL path must look like /api/webhooks/<id>/<token>');
  }
  const [, id, token] = match;
  return { id, token, url: `https://${parsed.hostname}/api/webhooks/${id}/${token}` };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/** Subset of the message object returned by `?wait=true`. */
export type SentMessage = {
  id: string;
  channelId: string;
  content: string;
};

export type WebhookClientOpts = {
  url: string;
  /** Executes requests. Default: a FetchDispatcher owned (and shut down) by the client. */
  dispatcher?: Dispatcher;
  log?: LoggerLike;
  /** Applied when a message sets no username of its own. */
  defaultUsername?: string;
  /** Applied when a message sets no avatar of its own. */
  defaultAvatarUrl?: string;
  /** Ask the endpoint to return the created message. Default: true. */
  wait?: boolean;
};

function parseSentMessage(response: DispatchResponse): SentMessage {
  const parsed: unknown = JSON.parse(response.body);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Webhook response is not a JSON object');
  }
  const id = 'id' in parsed ? parsed.id : undefined;
  const channelId = 'channel_id' in parsed ? parsed.channel_id : undefined;
  const content = 'content' in parsed ? parsed.content : undefined;
  if (typeof id !== 'string' || typeof channelId !== 'string') {
    throw new Error('Webhook response is missing id or channel_id');
  }
  return { id, channelId, content: typeof content === 'string' ? content : '' };
}

/**
 * Sends messages to one webhook. Every `send` returns a RequestFuture right
 * away; local validation failures come back as an already-failed future.
 */
export class WebhookClient {
  readonly target: WebhookTarget;
  private readonly dispatcher: Dispatcher;
  private readonly ownedDispatcher: FetchDispatcher | null;
  private readonly log: LoggerLike;
  private readonly defaultUsername: string | null;
  private readonly defaultAvatarUrl: string | null;
  private readonly wait: boolean;

  constructor(opts: WebhookClientOpts) {
    this.target = parseWebhookUrl(opts.url);
    this.log = opts.log ?? silentLogger;
    if (opts.dispatcher) {
      this.dispatcher = opts.dispatcher;
      this.ownedDispatcher = null;
    } else {
      this.ownedDispatcher = new FetchDispatcher({ log: this.log });
      this.dispatcher = this.ownedDispatcher;
    }
    this.defaultUsername = opts.defaultUsername ?? null;
    this.defaultAvatarUrl = opts.defaultAvatarUrl ?? null;
    this.wait = opts.wait ?? true;
  }

  get id(): string {
    return this.target.id;
  }

  /** Send plain text. */
  send(content: string): RequestFuture<SentMessage | null>;
  /** Send a prepared message. */
  send(message: WebhookMessage): RequestFuture<SentMessage | null>;
  /** Send one or more embeds. */
  send(...embeds: EmbedLike[]): RequestFuture<SentMessage | null>;
  send(...args: Array<string | WebhookMessage | EmbedLike>): RequestFuture<SentMessage | null> {
    let message: WebhookMessage;
    try {
      message = this.toMessage(args);
    } catch (err) {
      this.log.warn({ err, webhookId: this.id }, 'webhook:rejected locally');
      return RequestFuture.failed(err);
    }
    return this.submit(this.withDefaults(message));
  }

  /** Shut down the dispatcher if this client created it. */
  close(): void {
    this.ownedDispatcher?.shutdown();
  }

  private toMessage(args: ReadonlyArray<string | WebhookMessage | EmbedLike>): WebhookMessage {
    const [first] = args;
    if (args.length === 1 && first instanceof WebhookMessage) return first;
    if (args.length === 1 && typeof first === 'string') {
      if (first.trim().length === 0) {
        throw new InvalidArgumentError('Content may not be blank');
      }
      if (first.length > MAX_CONTENT_LENGTH) {
        throw new InvalidArgumentError(`Content may not exceed ${MAX_CONTENT_LENGTH} characters`);
      }
      return WebhookMessage.create({ content: first });
    }
    const embeds: EmbedLike[] = [];
    for (const arg of args) {
      if (typeof arg === 'string' || arg instanceof WebhookMessage) {
        throw new InvalidArgumentError('send() takes one string, one message, or embeds');
      }
      embeds.push(arg);
    }
    return WebhookMessage.embeds(...embeds);
  }

  private withDefaults(message: WebhookMessage): WebhookMessage {
    const username = message.username ?? this.defaultUsername;
    const avatarUrl = message.avatarUrl ?? this.defaultAvatarUrl;
    if (username === message.username && avatarUrl === message.avatarUrl) return message;
    return WebhookMessage.create({
      username,
      avatarUrl,
      content: message.content,
      embeds: message.embeds,
      tts: message.tts,
      attachments: message.attachments,
    });
  }

  /**
   * Encoding reads attachment streams, so the request is only handed to the
   * dispatcher once the body is ready. Cancelling in the meantime skips the
   * submission.
   */
  private submit(message: WebhookMessage): RequestFuture<SentMessage | null> {
    const url = this.wait ? `${this.target.url}?wait=true` : this.target.url;
    const parse = this.wait ? parseSentMessage : () => null;
    const gate = new DeferredDispatcher(this.dispatcher);

    const future = RequestFuture.submit<SentMessage | null>(
      gate,
      { method: 'POST', url, body: null, label: 'webhook:execute' },
      parse,
    );

    this.encodeAndRelease(message, gate).catch((err) => {
      this.log.error({ err, webhookId: this.id }, 'webhook:unexpected failure');
    });
    return future;
  }

  private async encodeAndRelease(message: WebhookMessage, gate: DeferredDispatcher): Promise<void> {
    let body: WireBody;
    try {
      body = await encodeMessage(message);
    } catch (err) {
      this.log.warn({ err, webhookId: this.id }, 'webhook:encode failed');
      gate.fail(err);
      return;
    }
    this.log.info({ webhookId: this.id, body: describeWireBody(body) }, 'webhook:send');
    gate.release(body);
  }
}

// ---------------------------------------------------------------------------
// DeferredDispatcher
// ---------------------------------------------------------------------------

type Parked = {
  request: RequestDescriptor;
  onSuccess: (response: DispatchResponse) => void;
  onFailure: (err: Error) => void;
};

/**
 * Holds a single submission until its body has been encoded, then forwards
 * it to the real dispatcher. Cancellation is forwarded too, whether it comes
 * before or after the hand-off.
 */
class DeferredDispatcher implements Dispatcher {
  private parked: Parked | null = null;
  private inner: CancelHandle | null = null;
  private cancelled = false;

  constructor(private readonly target: Dispatcher) {}

  submit(
    request: RequestDescriptor,
    onSuccess: (response: DispatchResponse) => void,
    onFailure: (err: Error) => void,
  ): CancelHandle {
    this.parked = { request, onSuccess, onFailure };
    return {
      cancel: (interrupt) => {
        this.cancelled = true;
        this.parked = null;
        this.inner?.cancel(interrupt);
      },
    };
  }

  release(body: WireBody): void {
    const parked = this.parked;
    this.parked = null;
    if (!parked || this.cancelled) return;
    try {
      this.inner = this.target.submit({ ...parked.request, body }, parked.onSuccess, parked.onFailure);
    } catch (err) {
      parked.onFailure(toError(err));
    }
  }

  fail(err: unknown): void {
    const parked = this.parked;
    this.parked = null;
    if (!parked || this.cancelled) return;
    parked.onFailure(toError(err));
  }
}
