import path from 'node:path';
import type { CourierConfig } from '../config.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { fromFile } from '../webhook/attachment.js';
import { WebhookClient } from '../webhook/client.js';
import { WebhookMessageBuilder } from '../webhook/message-builder.js';
import type { Dispatcher } from '../requests/types.js';

export type SendArgs = {
  content: string;
  files: string[];
  username?: string;
  tts?: boolean;
};

/**
 * Parse `send` arguments: `--file <path>` (repeatable), `--username <name>`,
 * `--tts`, and everything else joined as the message text.
 */
export function parseSendArgs(argv: string[]): SendArgs {
  const files: string[] = [];
  const words: string[] = [];
  let username: string | undefined;
  let tts: boolean | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--file' || arg === '--username') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`${arg} requires a value`);
      }
      if (arg === '--file') files.push(value);
      else username = value;
      i++;
    } else if (arg === '--tts') {
      tts = true;
    } else if (arg === '--') {
      words.push(...argv.slice(i + 1));
      break;
    } else {
      words.push(arg);
    }
  }

  return { content: words.join(' '), files, username, tts };
}

export type RunSendDeps = {
  config: CourierConfig;
  log: LoggerLike;
  /** Defaults to the client's own FetchDispatcher. */
  dispatcher?: Dispatcher;
};

/** Send one message built from CLI arguments. Resolves to the process exit code. */
export async function runSend(args: SendArgs, deps: RunSendDeps): Promise<number> {
  const { config, log } = deps;
  const builder = new WebhookMessageBuilder()
    .setUsername(args.username ?? config.username ?? null)
    .setAvatarUrl(config.avatarUrl ?? null)
    .setTTS(args.tts ?? config.tts);

  try {
    if (args.content.length > 0) builder.setContent(args.content);
    for (const file of args.files) builder.addFile(path.basename(file), fromFile(file));
  } catch (err) {
    builder.resetFiles();
    log.error({ err }, 'send:invalid message');
    return 1;
  }
  if (builder.isEmpty()) {
    log.error('send:nothing to send (give text or --file)');
    return 1;
  }

  const client = new WebhookClient({
    url: config.webhookUrl,
    dispatcher: deps.dispatcher,
    log,
    wait: config.wait,
  });

  try {
    const sent = await client.send(builder.build()).get();
    log.info({ messageId: sent?.id ?? null, files: args.files.length }, 'send:delivered');
    return 0;
  } catch (err) {
    log.error({ err }, 'send:failed');
    return 1;
  } finally {
    client.close();
  }
}
