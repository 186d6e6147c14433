import {
  QUEUED_MESSAGE,
  ReverseSessionTransport,
  ReverseSessionTransportOptions,
} from '../../src/reverse/transport';
import { SERVER_NAME } from '../../src/version';
import { FakeSocket, label, request } from '../mocks/fakeSocket';

describe('ReverseSessionTransport', () => {
  let socket: FakeSocket;
  let delivered: string[];
  let onReady: jest.Mock;

  function open(options: ReverseSessionTransportOptions = {}) {
    const transport = new ReverseSessionTransport(socket, { onReady, ...options });
    transport.onmessage = message => {
      delivered.push(label(message));
    };
    return transport;
  }

  beforeEach(() => {
    socket = new FakeSocket();
    delivered = [];
    onReady = jest.fn();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should queue tool calls that arrive before the handshake', async () => {
    const transport = open();
    await transport.start();

    transport.handleText(request(5, 'tools/call', { name: 'tap' }));

    expect(delivered).toEqual([]);
    expect(transport.queuedCount).toBe(1);
    expect(socket.messages()).toEqual([
      {
        jsonrpc: '2.0',
        method: 'notifications/message',
        params: {
          level: 'info',
          logger: SERVER_NAME,
          data: { requestId: 5, code: -32002, message: QUEUED_MESSAGE },
        },
      },
    ]);
  });

  it('should let other requests through before the handshake', async () => {
    const transport = open();
    await transport.start();

    transport.handleText(request(3, 'tools/list'));

    expect(delivered).toEqual(['tools/list#3']);
  });

  it('should reject tool calls once the queue is full', async () => {
    const transport = open({ queue: { capacity: 1 } });
    await transport.start();

    transport.handleText(request(5, 'tools/call'));
    transport.handleText(request(6, 'tools/call'));

    expect(socket.messages()[1]).toEqual({
      jsonrpc: '2.0',
      id: 6,
      error: { code: -32001, message: 'Request queue full, retry later' },
    });
    expect(transport.queuedCount).toBe(1);
  });

  it('should hold ten tool calls by default and reject the eleventh', async () => {
    const transport = open();
    await transport.start();

    for (let id = 101; id <= 111; id++) {
      transport.handleText(request(id, 'tools/call'));
    }

    const errors = socket
      .messages()
      .filter(message => typeof message === 'object' && message !== null && 'error' in message);
    expect(errors).toEqual([
      {
        jsonrpc: '2.0',
        id: 111,
        error: { code: -32001, message: 'Request queue full, retry later' },
      },
    ]);
    expect(transport.queuedCount).toBe(10);
    expect(delivered).toEqual([]);
  });

  it('should replay queued calls first once initialize is answered', async () => {
    const transport = open();
    await transport.start();

    transport.handleText(request(5, 'tools/call'));
    transport.handleText(request(1, 'initialize'));
    transport.handleText(request(7, 'tools/call'));
    transport.handleText(request(8, 'ping'));

    expect(delivered).toEqual(['initialize#1']);
    expect(transport.isReady).toBe(false);

    await transport.send({ jsonrpc: '2.0', id: 1, result: {} });

    expect(transport.isReady).toBe(true);
    expect(onReady).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith('[reverse] replaying 2 queued request(s)');
    expect(delivered).toEqual(['initialize#1', 'tools/call#5']);

    await transport.send({ jsonrpc: '2.0', id: 5, result: {} });
    await transport.send({ jsonrpc: '2.0', id: 7, result: {} });

    expect(delivered).toEqual(['initialize#1', 'tools/call#5', 'tools/call#7', 'ping#8']);
  });

  it('should deliver tool calls directly once ready', async () => {
    const transport = open();
    await transport.start();
    transport.handleText(request(1, 'initialize'));
    await transport.send({ jsonrpc: '2.0', id: 1, result: {} });

    transport.handleText(request(2, 'tools/call'));

    expect(delivered).toEqual(['initialize#1', 'tools/call#2']);
    expect(socket.sent).toHaveLength(1);
  });

  it('should stay unready when initialize fails', async () => {
    const transport = open();
    await transport.start();
    transport.handleText(request(1, 'initialize'));

    await transport.send({ jsonrpc: '2.0', id: 1, error: { code: -32602, message: 'bad version' } });

    expect(transport.isReady).toBe(false);
    expect(onReady).not.toHaveBeenCalled();
  });

  it('should drop queued calls that expired before the handshake', async () => {
    let clock = 0;
    const transport = open({ queue: { ttlMs: 100, now: () => clock } });
    await transport.start();

    transport.handleText(request(5, 'tools/call'));
    clock = 200;
    transport.handleText(request(1, 'initialize'));
    await transport.send({ jsonrpc: '2.0', id: 1, result: {} });

    expect(delivered).toEqual(['initialize#1']);
    expect(transport.queuedCount).toBe(0);
  });

  it('should discard the queue when the session closes', async () => {
    const transport = open();
    const onclose = jest.fn();
    transport.onclose = onclose;
    await transport.start();
    transport.handleText(request(5, 'tools/call'));

    transport.handleClose();

    expect(transport.queuedCount).toBe(0);
    expect(onclose).toHaveBeenCalledTimes(1);
  });
});
