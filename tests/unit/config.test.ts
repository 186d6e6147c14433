import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigKey, ConfigStore } from '../../src/config';

describe('ConfigStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'a11y-relay-config-'));
    filePath = path.join(dir, 'nested', 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('should start from defaults', () => {
    const config = new ConfigStore();

    expect(config.get('socketServerPort')).toBe(8080);
    expect(config.get('websocketPort')).toBe(8081);
    expect(config.get('authEnabled')).toBe(false);
    expect(config.get('mcpToolsEnabled')).toBeNull();
    expect(config.get('authToken')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should persist writes and reload them', () => {
    const first = new ConfigStore({ filePath });
    first.set('websocketPort', 9001);

    const second = new ConfigStore({ filePath });

    expect(second.get('websocketPort')).toBe(9001);
    expect(second.get('authToken')).toBe(first.get('authToken'));
  });

  it('should let initial values override the stored file', () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ socketServerPort: 9000, overlayOffset: 12 }));

    const config = new ConfigStore({ filePath, initial: { socketServerPort: 9100 } });

    expect(config.get('socketServerPort')).toBe(9100);
    expect(config.get('overlayOffset')).toBe(12);
    expect(JSON.parse(fs.readFileSync(filePath, 'utf8')).socketServerPort).toBe(9100);
  });

  it('should reject invalid values and keep the previous one', () => {
    const config = new ConfigStore();

    expect(() => config.set('socketServerPort', 0)).toThrow();
    expect(config.get('socketServerPort')).toBe(8080);
  });

  it('should notify listeners once per changed key', () => {
    const config = new ConfigStore();
    const seen: Array<{ key: ConfigKey; previous: unknown; next: unknown }> = [];
    config.subscribe((key, next, previous) => {
      seen.push({ key, previous: previous[key], next: next[key] });
    });

    config.update({ websocketPort: 9001, overlayOffset: 5 });
    config.set('websocketPort', 9001);

    expect(seen).toEqual([
      { key: 'websocketPort', previous: 8081, next: 9001 },
      { key: 'overlayOffset', previous: 0, next: 5 },
    ]);
  });

  it('should stop notifying after unsubscribe', () => {
    const config = new ConfigStore();
    const listener = jest.fn();
    const unsubscribe = config.subscribe(listener);

    unsubscribe();
    config.set('overlayOffset', 3);

    expect(listener).not.toHaveBeenCalled();
  });

  it('should keep notifying when a listener throws', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const config = new ConfigStore();
    const after = jest.fn();
    config.subscribe(() => {
      throw new Error('listener broke');
    });
    config.subscribe(after);

    config.set('overlayOffset', 3);

    expect(after).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      "[config] listener failed for 'overlayOffset':",
      'listener broke'
    );
  });

  it('should fall back to defaults when the file is not JSON', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, 'not json');

    const config = new ConfigStore({ filePath });

    expect(config.get('socketServerPort')).toBe(8080);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('should ignore a file with invalid values', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ socketServerPort: 'x' }));

    const config = new ConfigStore({ filePath });

    expect(config.get('socketServerPort')).toBe(8080);
    expect(console.error).toHaveBeenCalledWith(
      `[config] ignoring invalid ${filePath}: socketServerPort: Expected number, received string`
    );
  });
});
