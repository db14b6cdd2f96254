import { ChangeListener, SubscribeOptions } from '../services/changeNotifier.js';
import { Logger } from '../services/logger.js';

export const HEARTBEAT_INTERVAL_MS = 15_000;
export const SLOW_CLIENT_TIMEOUT_MS = 10_000;

/**
 * The part of an HTTP response the event stream writes to
 */
export interface EventSink {
  write(chunk: string): boolean;
  end(): void;
  on(event: 'drain', listener: () => void): unknown;
  off(event: 'drain', listener: () => void): unknown;
}

export interface ChangeSource {
  subscribe(listener: ChangeListener, options?: SubscribeOptions): () => void;
}

export interface EventStreamOptions {
  heartbeatIntervalMs?: number;
  slowClientTimeoutMs?: number;
}

/**
 * Writes change events to `sink` in Server-Sent Events framing. A client
 * whose buffer is still full `slowClientTimeoutMs` after a write is dropped.
 * The returned function detaches the stream without ending the response.
 */
export function streamEvents(
  sink: EventSink,
  source: ChangeSource,
  logger: Logger,
  options: EventStreamOptions = {},
): () => void {
  const slowClientTimeoutMs = options.slowClientTimeoutMs ?? SLOW_CLIENT_TIMEOUT_MS;
  let stalled: NodeJS.Timeout | undefined;
  let closed = false;
  let heartbeat: NodeJS.Timeout | undefined;
  let unsubscribe: (() => void) | undefined;

  const onDrain = (): void => {
    clearTimeout(stalled);
    stalled = undefined;
  };

  const close = (): void => {
    if (closed) return;
    closed = true;
    clearInterval(heartbeat);
    clearTimeout(stalled);
    sink.off('drain', onDrain);
    unsubscribe?.();
  };

  const drop = (reason: string): void => {
    if (closed) return;
    logger.warn('Dropping event stream client', { reason });
    close();
    sink.end();
  };

  const write = (chunk: string): void => {
    if (closed) return;
    if (!sink.write(chunk) && !stalled) {
      stalled = setTimeout(() => drop('not draining'), slowClientTimeoutMs);
    }
  };

  sink.on('drain', onDrain);
  unsubscribe = source.subscribe(event => {
    write(`id: ${event.sequence}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
  }, {
    onDrop: () => drop('fell behind the change feed')
  });
  heartbeat = setInterval(() => write(': ping\n\n'), options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS);
  write(': connected\n\n');

  return close;
}
