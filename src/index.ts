#!/usr/bin/env node

import fs from 'fs';
import { parseCliArgs } from './cli';
import { ConfigStore, ConfigStoreOptions, DEFAULT_CONFIG_FILE } from './config';
import { AdbDeviceAutomation } from './device/adbAutomation';
import { RelayService } from './relay';
import { compactTreeJson, formatCompactTree } from './tree/compactor';
import { formatErrorForResponse } from './utils/error';
import { SERVER_VERSION } from './version';

function runCompact(file: string): void {
  const result = compactTreeJson(fs.readFileSync(file, 'utf8'));
  if (!result.ok) {
    console.error(`${result.error.code}: ${result.error.message}`);
    process.exitCode = 1;
    return;
  }
  console.log(formatCompactTree(result.elements));
}

async function serve(options: ConfigStoreOptions): Promise<void> {
  const config = new ConfigStore(options);
  const device = new AdbDeviceAutomation({ deviceId: config.get('deviceId') });
  const relay = new RelayService({ config, device });

  const shutdown = (signal: string) => {
    console.error(`[relay] ${signal} received, shutting down`);
    relay.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[relay] shutdown failed:', formatErrorForResponse(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await relay.start();
  console.log(`a11y-relay ${SERVER_VERSION} running`);
}

async function main() {
  try {
    const command = parseCliArgs(process.argv.slice(2), process.env);
    switch (command.kind) {
      case 'version':
        console.log(SERVER_VERSION);
        return;
      case 'compact':
        runCompact(command.file);
        return;
      case 'serve':
        await serve({
          filePath: process.env.A11Y_RELAY_CONFIG ?? DEFAULT_CONFIG_FILE,
          initial: command.overrides,
        });
        return;
    }
  } catch (error) {
    console.error('Failed to start relay:', formatErrorForResponse(error));
    process.exit(1);
  }
}

void main();
