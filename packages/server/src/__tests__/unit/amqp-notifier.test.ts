import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AmqpNotifier } from '../../notifier/amqp-notifier.js';
import { createRecordingLogger, type LogLine } from '../fixtures.js';

// In-process stand-in for the broker client
const broker = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void;

  class FakeEmitter {
    private readonly listeners = new Map<string, Listener[]>();

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
      return this;
    }

    // Like EventEmitter: an 'error' nobody listens for is thrown
    emit(event: string, ...args: unknown[]): boolean {
      const listeners = this.listeners.get(event) ?? [];
      if (event === 'error' && listeners.length === 0) {
        throw args[0];
      }
      for (const listener of listeners) {
        listener(...args);
      }
      return listeners.length > 0;
    }
  }

  interface SentMessage {
    queue: string;
    content: Buffer;
    options: unknown;
  }

  class FakeChannel extends FakeEmitter {
    closed = false;
    readonly queues: string[] = [];
    readonly sent: SentMessage[] = [];

    async assertQueue(queue: string): Promise<{ queue: string }> {
      this.queues.push(queue);
      return { queue };
    }

    sendToQueue(queue: string, content: Buffer, options: unknown): boolean {
      if (this.closed) {
        throw new Error('Channel closed');
      }
      this.sent.push({ queue, content, options });
      return true;
    }

    async close(): Promise<void> {
      this.closed = true;
      this.emit('close');
    }
  }

  class FakeConnection extends FakeEmitter {
    readonly channel = new FakeChannel();

    async createChannel(): Promise<FakeChannel> {
      return this.channel;
    }

    async close(): Promise<void> {}
  }

  const connections: FakeConnection[] = [];
  return { FakeConnection, connections };
});

vi.mock('amqplib', () => ({
  default: {
    connect: async () => {
      const connection = new broker.FakeConnection();
      broker.connections.push(connection);
      return connection;
    },
  },
}));

const MESSAGE = {
  to: 'alice@example.com',
  link: 'http://auth.test/auth/verify?token=abc',
  subject: 'Verify your email address',
  purpose: 'email_verification' as const,
};

describe('AmqpNotifier', () => {
  let lines: LogLine[];
  let notifier: AmqpNotifier;

  function currentChannel() {
    const channel = broker.connections.at(-1)?.channel;
    if (!channel) {
      throw new Error('No channel was opened');
    }
    return channel;
  }

  beforeEach(async () => {
    const recording = createRecordingLogger();
    lines = recording.lines;
    notifier = await AmqpNotifier.connect({ url: 'amqp://localhost', queue: 'email_messages', logger: recording.logger });
  });

  it('should declare the queue and publish persistent JSON', async () => {
    await notifier.publish(MESSAGE);

    const channel = currentChannel();
    expect(channel.queues).toEqual(['email_messages']);
    expect(channel.sent).toHaveLength(1);
    expect(channel.sent[0]?.queue).toBe('email_messages');
    expect(JSON.parse(channel.sent[0]?.content.toString('utf8') ?? '')).toEqual(MESSAGE);
    expect(channel.sent[0]?.options).toEqual({ persistent: true, contentType: 'application/json' });
  });

  it('should log a channel error instead of crashing', () => {
    const channel = currentChannel();

    expect(() => channel.emit('error', new Error('PRECONDITION_FAILED'))).not.toThrow();
    expect(lines.filter((line) => line.message === 'AMQP channel error')).toHaveLength(1);
    expect(lines.find((line) => line.message === 'AMQP channel error')?.level).toBe('error');
  });

  it('should log when the channel closes and fail later publishes', async () => {
    const channel = currentChannel();

    await channel.close();

    expect(lines.find((line) => line.message === 'AMQP channel closed')?.level).toBe('warn');
    await expect(notifier.publish(MESSAGE)).rejects.toMatchObject({
      code: 'internal_error',
      operation: 'notifier.publish',
    });
  });
});
