/**
 * CLI 実行コンテキスト
 */

import * as readline from 'readline/promises';
import type { AgentConfig } from '@persona-desk/persona-spec';
import { createLogger, ensureDirectories, loadConfig } from '@persona-desk/runtime';
import { PersonaAgent, type SessionIO } from '@persona-desk/agents';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliSession extends SessionIO {
  close(): void;
}

export interface CliContextOptions {
  io: CliIO;
  cwd: string;
  env: Record<string, string | undefined>;
  createAgent?: (config: AgentConfig) => PersonaAgent;
  createSession?: () => CliSession;
}

export interface CliContext {
  readonly io: CliIO;
  readonly cwd: string;
  config(): AgentConfig;
  agent(): PersonaAgent;
  session(): CliSession;
  warn(message: string): void;
}

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export interface TerminalStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  terminal?: boolean;
}

/**
 * 端末の対話入出力（stdin が閉じたら、または Ctrl+C で null）
 */
export function createTerminalSession(
  streams: TerminalStreams = { input: process.stdin, output: process.stdout }
): CliSession {
  const rl = readline.createInterface(streams);
  rl.on('SIGINT', () => rl.close());
  let closed = false;
  const closedSignal = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    read: (prompt) => {
      if (closed) {
        return Promise.resolve(null);
      }
      const answer = rl.question(prompt).catch((error: unknown) => {
        if (closed) {
          return null;
        }
        throw error;
      });
      return Promise.race([answer, closedSignal]);
    },
    write: (text) => console.log(text),
    close: () => rl.close(),
  };
}

function defaultAgent(config: AgentConfig): PersonaAgent {
  ensureDirectories(config);
  const logger = createLogger({ level: config.log_level, logDir: config.log_dir });
  return new PersonaAgent({ config, logger });
}

export function createCliContext(options: CliContextOptions): CliContext {
  let config: AgentConfig | undefined;
  let agent: PersonaAgent | undefined;
  const createAgent = options.createAgent ?? defaultAgent;

  const loadOnce = (): AgentConfig => {
    config ??= loadConfig({ cwd: options.cwd, env: options.env });
    return config;
  };

  return {
    io: options.io,
    cwd: options.cwd,
    config: loadOnce,
    agent: () => {
      agent ??= createAgent(loadOnce());
      return agent;
    },
    session: options.createSession ?? (() => createTerminalSession()),
    warn: (message) => options.io.err(`⚠️ ${message}`),
  };
}
