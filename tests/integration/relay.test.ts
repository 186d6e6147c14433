import { ConfigStore, RelayConfig } from '../../src/config';
import { RelayService } from '../../src/relay';
import { FakeDevice } from '../mocks/fakeDevice';
import { FakeSocket } from '../mocks/fakeSocket';

describe('RelayService', () => {
  let config: ConfigStore;
  let relay: RelayService;
  let opened: Array<{ url: string; socket: FakeSocket }>;

  function createRelay(initial: Partial<RelayConfig> = {}): void {
    config = new ConfigStore({
      initial: {
        socketServerHost: '127.0.0.1',
        reverseConnectionUrl: 'ws://controller.test/relay',
        ...initial,
      },
    });
    relay = new RelayService({
      config,
      device: new FakeDevice(),
      httpPort: 0,
      wsPort: 0,
      settleMs: 0,
      socketFactory: url => {
        const socket = new FakeSocket();
        opened.push({ url, socket });
        return socket;
      },
    });
  }

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    opened = [];
  });

  afterEach(async () => {
    await relay.stop();
    jest.restoreAllMocks();
  });

  it('should start the enabled listeners', async () => {
    createRelay();

    await relay.start();

    expect(relay.isRunning).toBe(true);
    expect(relay.http.isListening).toBe(true);
    expect(relay.http.port).toBeGreaterThan(0);
    expect(relay.websocket.port).toBeGreaterThan(0);
    expect(relay.reverse.isRunning).toBe(false);
    expect(opened).toHaveLength(0);
  });

  it('should leave disabled listeners stopped', async () => {
    createRelay({ socketServerEnabled: false, websocketEnabled: false });

    await relay.start();

    expect(relay.http.isListening).toBe(false);
    expect(relay.websocket.port).toBeNull();
  });

  it('should connect out at start when the reverse connection is enabled', async () => {
    createRelay({ reverseConnectionEnabled: true });

    await relay.start();

    expect(relay.reverse.isRunning).toBe(true);
    expect(opened.map(entry => entry.url)).toEqual(['ws://controller.test/relay']);
  });

  it('should follow the reverse connection switch', async () => {
    createRelay();
    await relay.start();

    config.set('reverseConnectionEnabled', true);
    expect(relay.reverse.isRunning).toBe(true);
    expect(opened).toHaveLength(1);

    config.set('reverseConnectionEnabled', false);
    expect(relay.reverse.isRunning).toBe(false);
    expect(opened[0].socket.closes).toEqual([{ code: 1000, reason: 'Client stopping' }]);
  });

  it('should reconnect to a changed URL', async () => {
    createRelay({ reverseConnectionEnabled: true });
    await relay.start();

    config.set('reverseConnectionUrl', 'ws://other.test/relay');

    expect(opened.map(entry => entry.url)).toEqual(['ws://controller.test/relay', 'ws://other.test/relay']);
    expect(relay.reverse.isRunning).toBe(true);
  });

  it('should stop every transport', async () => {
    createRelay({ reverseConnectionEnabled: true });
    await relay.start();

    await relay.stop();

    expect(relay.isRunning).toBe(false);
    expect(relay.http.isListening).toBe(false);
    expect(relay.websocket.port).toBeNull();
    expect(relay.reverse.isRunning).toBe(false);
  });
});
