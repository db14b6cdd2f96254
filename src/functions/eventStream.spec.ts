import { EventEmitter } from 'node:events';
import { ChangeNotifier } from '../services/changeNotifier.js';
import { Logger } from '../services/logger.js';
import { createMonotonicClock } from '../services/utils/clock.js';
import { EventSink, streamEvents } from './eventStream.js';

const logger = new Logger({ level: 'silent' });

class FakeSink extends EventEmitter implements EventSink {
  readonly chunks: string[] = [];
  ended = false;

  constructor(private readonly accepts: boolean) {
    super();
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return this.accepts;
  }

  end(): void {
    this.ended = true;
  }
}

describe('streamEvents', () => {
  let notifier: ChangeNotifier;

  beforeEach(() => {
    notifier = new ChangeNotifier(logger, { now: createMonotonicClock(() => 0) });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('writes events in event-stream framing until detached', async () => {
    const sink = new FakeSink(true);
    const close = streamEvents(sink, notifier, logger);
    const payload = { touched: ['concept://notes/a'], evicted: [], cleared: false };

    notifier.emit({ type: 'context_updated', payload });
    await new Promise(resolve => setImmediate(resolve));
    close();
    notifier.emit({ type: 'context_updated', payload });
    await new Promise(resolve => setImmediate(resolve));

    const data = JSON.stringify({ sequence: 1, timestamp: '1970-01-01T00:00:00.001Z', type: 'context_updated', payload });
    expect(sink.chunks).toEqual([': connected\n\n', `id: 1\nevent: context_updated\ndata: ${data}\n\n`]);
    expect(sink.ended).toBe(false);
    expect(notifier.subscriberCount).toBe(0);
  });

  it('drops a client whose buffer stays full', () => {
    jest.useFakeTimers();
    const sink = new FakeSink(false);
    streamEvents(sink, notifier, logger, { slowClientTimeoutMs: 1000, heartbeatIntervalMs: 60_000 });

    jest.advanceTimersByTime(999);
    expect(sink.ended).toBe(false);

    jest.advanceTimersByTime(1);
    expect(sink.ended).toBe(true);
    expect(notifier.subscriberCount).toBe(0);
    expect(sink.listenerCount('drain')).toBe(0);
  });

  it('keeps a client that drains in time', () => {
    jest.useFakeTimers();
    const sink = new FakeSink(false);
    const close = streamEvents(sink, notifier, logger, { slowClientTimeoutMs: 1000, heartbeatIntervalMs: 60_000 });

    jest.advanceTimersByTime(500);
    sink.emit('drain');
    jest.advanceTimersByTime(1000);

    expect(sink.ended).toBe(false);
    expect(notifier.subscriberCount).toBe(1);
    close();
  });
});
