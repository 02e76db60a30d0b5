import type { APIEmbed } from 'discord.js';
import { TransportError } from '../errors.js';
import type { Attachment } from './attachment.js';
import type { WebhookMessage } from './message.js';

export const JSON_CONTENT_TYPE = 'application/json';
export const OCTET_STREAM = 'application/octet-stream';

/** JSON payload accepted by the webhook execute endpoint. */
export type WebhookPayload = {
  content?: string;
  embeds?: APIEmbed[];
  avatar_url?: string;
  username?: string;
  tts: boolean;
};

export type WireBody =
  | { type: 'json'; contentType: typeof JSON_CONTENT_TYPE; body: string }
  | { type: 'multipart'; body: FormData };

/** Fields appear only when set, except `tts`, which is always sent. */
export function buildPayloadJson(message: WebhookMessage): WebhookPayload {
  const payload: Omit<WebhookPayload, 'tts'> = {};
  if (message.content != null) payload.content = message.content;
  if (message.embeds.length > 0) payload.embeds = message.embeds.map((e) => e.toJSON());
  if (message.avatarUrl != null) payload.avatar_url = message.avatarUrl;
  if (message.username != null) payload.username = message.username;
  return { ...payload, tts: message.tts };
}

async function readAttachment(attachment: Attachment): Promise<ArrayBuffer> {
  const stream = attachment.open();
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } catch (err) {
    throw new TransportError(`Failed to read attachment "${attachment.name}"`, { cause: err });
  }
  const buf = Buffer.concat(chunks);
  // Copy into a plain ArrayBuffer so TypeScript accepts it as BlobPart
  const ab = new ArrayBuffer(buf.byteLength);
  new Uint8Array(ab).set(buf);
  return ab;
}

/**
 * Turn a message into the body of a webhook execute request.
 *
 * Without attachments this is the JSON payload as text. With attachments it
 * is multipart form data: `file0`..`fileN` carrying the bytes of each
 * attachment, then `payload_json` with the JSON payload. Every attachment is
 * read once and closed, whether or not encoding succeeds.
 */
export async function encodeMessage(message: WebhookMessage): Promise<WireBody> {
  const json = JSON.stringify(buildPayloadJson(message));
  const attachments = message.attachments;
  if (attachments === null) {
    return { type: 'json', contentType: JSON_CONTENT_TYPE, body: json };
  }

  try {
    const form = new FormData();
    for (let i = 0; i < attachments.length; i++) {
      const attachment = attachments[i];
      if (attachment == null) break;
      const bytes = await readAttachment(attachment);
      form.append(`file${i}`, new Blob([bytes], { type: OCTET_STREAM }), attachment.name);
    }
    form.append('payload_json', json);
    return { type: 'multipart', body: form };
  } finally {
    for (const attachment of attachments) attachment?.close();
  }
}

/** Short description of a wire body for logs. */
export function describeWireBody(wire: WireBody): { type: WireBody['type']; parts?: string[]; bytes?: number } {
  if (wire.type === 'json') {
    return { type: 'json', bytes: Buffer.byteLength(wire.body) };
  }
  return { type: 'multipart', parts: [...wire.body.keys()] };
}
