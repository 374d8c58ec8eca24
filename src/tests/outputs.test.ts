/**
 * Tests for the built-in outputs
 */
import WebSocket from 'ws';
import { ConsoleOutput } from '../components/ConsoleOutput';
import { WebSocketMessage, WebSocketOutput } from '../components/WebSocketOutput';
import { Status } from '../interfaces';
import { RecordingNotifier } from './setup';

describe('ConsoleOutput', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('prints each response behind its prefix', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    const notifier = new RecordingNotifier();
    const output = new ConsoleOutput(notifier, 'Computer: ');
    await output.start();

    await output.write('It is noon.');

    expect(logSpy).toHaveBeenCalledWith('Computer: It is noon.');
    expect(notifier.updates.map(update => update.status)).toEqual([
      Status.INITIALIZING,
      Status.IDLE,
      Status.WORKING,
      Status.IDLE
    ]);
  });
});

describe('WebSocketOutput', () => {
  let output: WebSocketOutput;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    output = new WebSocketOutput(null, 0);
    await output.start();
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.terminate();
    }
    await output.stop();
    jest.restoreAllMocks();
  });

  function connect(): Promise<{ client: WebSocket; messages: WebSocketMessage[]; next: () => Promise<WebSocketMessage> }> {
    return new Promise((resolve, reject) => {
      const client = new WebSocket(`ws://localhost:${output.getPort()}`);
      clients.push(client);
      const messages: WebSocketMessage[] = [];
      const waiting: ((message: WebSocketMessage) => void)[] = [];

      client.on('message', (data) => {
        const message: WebSocketMessage = JSON.parse(data.toString());
        messages.push(message);
        waiting.shift()?.(message);
      });

      const next = (): Promise<WebSocketMessage> => new Promise(done => waiting.push(done));

      client.once('error', reject);
      // The ack is the first message, so the server has registered us once it arrives
      next().then(() => resolve({ client, messages, next }), reject);
    });
  }

  test('acknowledges a new client with its id', async () => {
    const { messages } = await connect();

    expect(messages).toHaveLength(1);
    expect(messages[0].type).toBe('ack');
    expect(typeof messages[0].payload.clientId).toBe('string');
    expect(output.getClientCount()).toBe(1);
  });

  test('broadcasts responses to every client', async () => {
    const first = await connect();
    const second = await connect();

    const received = Promise.all([first.next(), second.next()]);
    await output.write('hello there');

    for (const message of await received) {
      expect(message.type).toBe('response');
      expect(message.payload).toEqual({ text: 'hello there' });
    }
  });

  test('listens on an ephemeral port when given 0', () => {
    expect(output.getPort()).toBeGreaterThan(0);
  });

  test('writing with nobody connected is fine', async () => {
    await expect(output.write('anyone?')).resolves.toBeUndefined();
  });
});
