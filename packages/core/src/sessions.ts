/**
 * Session registry. Sessions share nothing but the history database, where
 * entries are keyed by session id.
 */

import type { AppConfig } from './config.js';
import type { DriverFactory } from './db/drivers.js';
import { invalidRequest } from './errors.js';
import { OpenAIModel } from './llm/openai.js';
import type { LanguageModel } from './llm/types.js';
import { Session, settingsFromConfig } from './session.js';
import { HistoryStore } from './storage/history.js';
import { LocalStore } from './storage/sqlite.js';
import { createLogger, type Logger } from './utils/logger.js';

export type SessionFactory = (id?: string) => Session;

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly factory: SessionFactory) {}

  create(id?: string): Session {
    if (id !== undefined && this.sessions.has(id)) {
      throw invalidRequest(`Session ${id} already exists.`);
    }
    const session = this.factory(id);
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  require(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw invalidRequest(`Unknown session ${id}.`);
    }
    return session;
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  /** Disconnects and forgets the session; false when it was not registered */
  async close(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.sessions.delete(id);
    await session.close();
    return true;
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(open.map((session) => session.close()));
  }
}

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  registry: SessionRegistry;
  /** Closes every session and the history database */
  shutdown(): Promise<void>;
}

export interface RuntimeOverrides {
  model?: LanguageModel;
  logger?: Logger;
  driverFactory?: DriverFactory;
}

/**
 * Wire sessions from configuration: the OpenAI model unless one is given,
 * and a migrated history database when history is enabled.
 */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const model =
    overrides.model ?? new OpenAIModel({ apiKey: config.llm.apiKey, baseUrl: config.llm.baseUrl, model: config.llm.model });

  let store: LocalStore | null = null;
  let history: HistoryStore | null = null;
  if (config.history.enabled) {
    store = new LocalStore(config.history.path);
    store.migrate();
    history = new HistoryStore(store.getDb());
  }

  const settings = settingsFromConfig(config);
  const registry = new SessionRegistry(
    (id) => new Session({ id, model, settings, history, logger, driverFactory: overrides.driverFactory }),
  );

  return {
    config,
    logger,
    registry,
    async shutdown() {
      await registry.closeAll();
      store?.close();
    },
  };
}
