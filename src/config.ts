import { randomUUID } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';

export const APP_STATE_DIR = path.join(os.homedir(), '.a11y-relay');
export const DEFAULT_CONFIG_FILE = path.join(APP_STATE_DIR, 'config.json');

const PortSchema = z.number().int().min(1).max(65535);

export const RelayConfigSchema = z.object({
  socketServerEnabled: z.boolean().default(true),
  socketServerPort: PortSchema.default(8080),
  socketServerHost: z.string().default('0.0.0.0'),
  websocketEnabled: z.boolean().default(true),
  websocketPort: PortSchema.default(8081),
  authEnabled: z.boolean().default(false),
  authToken: z.string().default(() => randomUUID()),
  reverseConnectionEnabled: z.boolean().default(false),
  reverseConnectionUrl: z.string().default(''),
  reverseConnectionToken: z.string().default(''),
  heartbeatIntervalMs: z.number().int().positive().default(30000),
  heartbeatTimeoutMs: z.number().int().positive().default(10000),
  overlayOffset: z.number().int().default(0),
  // null enables every tool
  mcpToolsEnabled: z.array(z.string()).nullable().default(null),
  waitIntervalMs: z.number().int().positive().default(200),
  waitTimeoutMs: z.number().int().positive().default(10000),
  deviceId: z.string().optional(),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type ConfigKey = keyof RelayConfig;

const CONFIG_KEYS: readonly ConfigKey[] = RelayConfigSchema.keyof().options;

export type ConfigListener = (key: ConfigKey, config: RelayConfig, previous: RelayConfig) => void;

export interface ConfigStoreOptions {
  // Omit to keep the configuration in memory only.
  filePath?: string;
  initial?: Partial<RelayConfig>;
}

/**
 * Typed key/value configuration. Writes are validated, persisted when a file is
 * attached, and announced to the listeners registered on this instance.
 */
export class ConfigStore {
  private config: RelayConfig;
  private readonly listeners: ConfigListener[] = [];
  private readonly filePath?: string;

  constructor(options: ConfigStoreOptions = {}) {
    this.filePath = options.filePath;
    const stored = this.filePath ? readConfigFile(this.filePath) : {};
    this.config = RelayConfigSchema.parse({ ...stored, ...options.initial });
    this.persist();
  }

  get<K extends ConfigKey>(key: K): RelayConfig[K] {
    return this.config[key];
  }

  snapshot(): RelayConfig {
    return { ...this.config };
  }

  set<K extends ConfigKey>(key: K, value: RelayConfig[K]): void {
    const partial: Partial<RelayConfig> = {};
    partial[key] = value;
    this.update(partial);
  }

  update(partial: Partial<RelayConfig>): void {
    const previous = this.config;
    const next = RelayConfigSchema.parse({ ...previous, ...partial });
    const changed = CONFIG_KEYS.filter(
      key => JSON.stringify(next[key]) !== JSON.stringify(previous[key])
    );
    if (changed.length === 0) {
      return;
    }

    this.config = next;
    this.persist();
    for (const key of changed) {
      this.notify(key, previous);
    }
  }

  subscribe(listener: ConfigListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  private notify(key: ConfigKey, previous: RelayConfig): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(key, this.config, previous);
      } catch (error) {
        console.error(
          `[config] listener failed for '${key}':`,
          error instanceof Error ? error.message : String(error)
        );
      }
    }
  }

  private persist(): void {
    if (!this.filePath) {
      return;
    }
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(this.config, null, 2), 'utf8');
  }
}

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    console.error(
      `[config] ignoring unreadable ${filePath}:`,
      error instanceof Error ? error.message : String(error)
    );
    return {};
  }

  const checked = RelayConfigSchema.partial().safeParse(parsed);
  if (!checked.success) {
    const issues = checked.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    console.error(`[config] ignoring invalid ${filePath}: ${issues.join('; ')}`);
    return {};
  }

  return checked.data;
}
