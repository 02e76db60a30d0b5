#!/usr/bin/env node
/**
 * webhook-courier CLI entrypoint.
 * Usage: webhook-courier <command> [options]
 */

import { createRequire } from 'node:module';
import pino from 'pino';
import { parseConfig } from '../config.js';
import { FetchDispatcher } from '../requests/fetch-dispatcher.js';
import { parseSendArgs, runSend } from './send-command.js';

const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const [, , command, ...rest] = process.argv;

switch (command) {
  case 'send': {
    const bootLog = pino({ level: process.env.LOG_LEVEL ?? 'info' });
    let parsedConfig;
    try {
      parsedConfig = parseConfig(process.env);
    } catch (err) {
      bootLog.error({ err }, 'Invalid configuration');
      process.exit(1);
    }
    const cfg = parsedConfig.config;
    const log = pino({ level: cfg.logLevel });
    for (const warning of parsedConfig.warnings) log.warn(warning);
    for (const info of parsedConfig.infos) log.info(info);

    let args;
    try {
      args = parseSendArgs(rest);
    } catch (err) {
      console.error(`${err instanceof Error ? err.message : String(err)}\n`);
      printHelp(version);
      process.exit(1);
    }

    const dispatcher = new FetchDispatcher({
      maxConcurrent: cfg.maxConcurrent,
      timeoutMs: cfg.timeoutMs,
      userAgent: `webhook-courier/${version}`,
      log,
    });
    const code = await runSend(args, { config: cfg, log, dispatcher });
    dispatcher.shutdown();
    process.exitCode = code;
    break;
  }
  case '--version':
  case '-v':
    console.log(version);
    break;
  case '--help':
  case '-h':
  case undefined:
    printHelp(version);
    break;
  default:
    console.error(`Unknown command: ${command}\n`);
    printHelp(version);
    process.exit(1);
}

function printHelp(ver: string): void {
  console.log(
    `webhook-courier v${ver}: send messages to a Discord webhook\n` +
      `\nUsage: webhook-courier <command>\n` +
      `\nCommands:\n` +
      `  send [text...]          Send a message to WEBHOOK_URL\n` +
      `    --file <path>         Attach a file (repeatable, up to 20)\n` +
      `    --username <name>     Override the sender name\n` +
      `    --tts                 Send as text-to-speech\n` +
      `\nEnvironment:\n` +
      `  WEBHOOK_URL, WEBHOOK_USERNAME, WEBHOOK_AVATAR_URL, WEBHOOK_TTS, WEBHOOK_WAIT,\n` +
      `  WEBHOOK_MAX_CONCURRENT, WEBHOOK_TIMEOUT_MS, LOG_LEVEL\n` +
      `\nOptions:\n` +
      `  -v, --version   Print version\n` +
      `  -h, --help      Print this help\n`,
  );
}
