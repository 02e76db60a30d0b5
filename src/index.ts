export { MAX_CONTENT_LENGTH, MAX_EMBEDS, MAX_FILES } from './limits.js';
export {
  CancellationError,
  InvalidArgumentError,
  TransportError,
  UnsupportedOperationError,
  type ErrorCode,
} from './errors.js';
export type { LoggerLike } from './logging/logger-like.js';
export {
  Attachment,
  convertAttachment,
  fromBytes,
  fromFile,
  fromStream,
  type AttachmentSource,
} from './webhook/attachment.js';
export {
  WebhookMessage,
  type AttachmentMap,
  type EmbedLike,
  type MessageLike,
} from './webhook/message.js';
export { WebhookMessageBuilder } from './webhook/message-builder.js';
export {
  buildPayloadJson,
  encodeMessage,
  type WebhookPayload,
  type WireBody,
} from './webhook/payload.js';
export {
  WebhookClient,
  parseWebhookUrl,
  type SentMessage,
  type WebhookClientOpts,
  type WebhookTarget,
} from './webhook/client.js';
export { RequestFuture, type FutureOutcome, type FutureState } from './requests/request-future.js';
export { FetchDispatcher, type FetchDispatcherOpts } from './requests/fetch-dispatcher.js';
export type {
  CancelHandle,
  Dispatcher,
  DispatchResponse,
  HttpMethod,
  RequestDescriptor,
} from './requests/types.js';
export { parseConfig, type CourierConfig } from './config.js';
