import net from 'net';
import { ConfigStore, ConfigStoreOptions } from '../../src/config';
import { CommandDispatcher } from '../../src/dispatcher';
import { RelayHttpServer } from '../../src/http/server';
import { compact } from '../../src/tree/compactor';
import { SERVER_NAME, SERVER_VERSION } from '../../src/version';
import { mockScreenshotData } from '../mocks/adb.mock';
import { FakeDevice } from '../mocks/fakeDevice';
import { waitUntil } from '../mocks/fakeSocket';
import { SCREEN, loginScreen } from '../mocks/trees';

async function freePort(): Promise<number> {
  const listener = net.createServer();
  await new Promise<void>(resolve => listener.listen(0, '127.0.0.1', () => resolve()));
  const address = listener.address();
  const port = address && typeof address !== 'string' ? address.port : 0;
  await new Promise<void>(resolve => listener.close(() => resolve()));
  return port;
}

describe('RelayHttpServer', () => {
  let config: ConfigStore;
  let device: FakeDevice;
  let server: RelayHttpServer;
  let baseUrl: string;

  async function startServer(options: ConfigStoreOptions = {}): Promise<void> {
    config = new ConfigStore(options);
    device = new FakeDevice();
    server = new RelayHttpServer({
      dispatcher: new CommandDispatcher(device, config),
      config,
      port: 0,
      host: '127.0.0.1',
    });
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  }

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await server.stop();
    jest.restoreAllMocks();
  });

  describe('without authentication', () => {
    beforeEach(async () => {
      await startServer();
    });

    it('should answer GET queries', async () => {
      const ping = await fetch(`${baseUrl}/ping`);
      expect(ping.status).toBe(200);
      expect(ping.headers.get('access-control-allow-origin')).toBe('*');
      expect(await ping.json()).toEqual({ success: true, message: 'pong' });

      const version = await fetch(`${baseUrl}/version`);
      expect(await version.json()).toEqual({
        success: true,
        data: { name: SERVER_NAME, version: SERVER_VERSION },
      });
    });

    it('should return the compact tree', async () => {
      const response = await fetch(`${baseUrl}/a11y_tree`);

      expect(await response.json()).toEqual({
        success: true,
        data: compact(loginScreen(), { screenBounds: SCREEN }),
      });
    });

    it('should reject unknown GET paths', async () => {
      const response = await fetch(`${baseUrl}/tap`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Not found: /tap',
        code: 'UNKNOWN_ACTION',
      });
    });

    it('should run actions posted as JSON', async () => {
      const response = await fetch(`${baseUrl}/tap`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ x: 10, y: 20 }),
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ success: true, message: 'Tap performed at (10, 20)' });
      expect(device.gestures).toEqual([[{ points: [{ x: 10, y: 20 }], startTime: 0, duration: 50 }]]);
    });

    it('should run actions posted as a form', async () => {
      const response = await fetch(`${baseUrl}/action/key`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: 'key_code=66',
      });

      expect(await response.json()).toEqual({ success: true, message: 'Key event 66 sent' });
      expect(device.keyEvents).toEqual([66]);
    });

    it('should report unknown actions with status 200', async () => {
      const response = await fetch(`${baseUrl}/explode`, { method: 'POST' });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Unknown action: /explode',
        code: 'UNKNOWN_ACTION',
      });
    });

    it('should reject a malformed JSON body', async () => {
      const response = await fetch(`${baseUrl}/tap`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"x":',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: expect.stringMatching(/^Invalid JSON body: /),
        code: 'MALFORMED_INPUT',
      });
    });

    it('should answer preflight requests', async () => {
      const response = await fetch(`${baseUrl}/tap`, { method: 'OPTIONS' });

      expect(response.status).toBe(204);
      expect(response.headers.get('access-control-allow-methods')).toBe('GET, POST, OPTIONS');
      expect(response.headers.get('access-control-allow-headers')).toBe('Authorization, Content-Type');
    });

    it('should refuse other methods', async () => {
      const response = await fetch(`${baseUrl}/tap`, { method: 'DELETE' });

      expect(response.status).toBe(405);
      expect(response.headers.get('allow')).toBe('GET, POST, OPTIONS');
      expect(await response.json()).toEqual({
        success: false,
        error: 'Method not allowed: DELETE',
        code: 'UNKNOWN_ACTION',
      });
    });

    it('should return screenshots as PNG bytes', async () => {
      const response = await fetch(`${baseUrl}/screenshot`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('image/png');
      expect(Buffer.from(await response.arrayBuffer())).toEqual(mockScreenshotData);
    });

    it('should move to a new port when the socket port changes', async () => {
      const nextPort = await freePort();

      const response = await fetch(`${baseUrl}/socket_port`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ port: nextPort }),
      });
      expect(await response.json()).toEqual({
        success: true,
        message: `Socket server port updated to ${nextPort}`,
      });

      await waitUntil(() => server.port === nextPort);
      const ping = await fetch(`http://127.0.0.1:${nextPort}/ping`);
      expect(await ping.json()).toEqual({ success: true, message: 'pong' });
    });
  });

  describe('with authentication', () => {
    beforeEach(async () => {
      await startServer({ initial: { authEnabled: true, authToken: 'test-secret' } });
    });

    it('should refuse requests without the token', async () => {
      const response = await fetch(`${baseUrl}/state`);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Unauthorized',
        code: 'UNAUTHORIZED',
      });
      expect(device.snapshots).toBe(0);
    });

    it('should leave the health check open', async () => {
      const response = await fetch(`${baseUrl}/ping`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ success: true, message: 'pong' });
    });

    it('should accept the token as a header or query parameter', async () => {
      const byHeader = await fetch(`${baseUrl}/phone_state`, {
        headers: { Authorization: 'Bearer test-secret' },
      });
      const byQuery = await fetch(`${baseUrl}/phone_state?token=test-secret`);

      expect(byHeader.status).toBe(200);
      expect(await byHeader.json()).toMatchObject({ success: true });
      expect(byQuery.status).toBe(200);
      expect(await byQuery.json()).toMatchObject({ data: { packageName: 'com.example.app' } });
    });
  });
});
