// src/lib/eventStream.ts
import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import type { EventBus, Receiver } from './bus.js';
import { errorMessage } from './errors.js';
import { LOG } from './logger.js';

const log = LOG.tag('event-stream');

export type EventStream = {
  port: number;
  clients(): number;
  close(): Promise<void>;
};

/** Where a client's frames go. `send` settles once the frame is written out. */
export type FrameSink = {
  isOpen(): boolean;
  send(frame: string): Promise<void>;
};

/**
 * Forwards `rx` one frame at a time. While a frame is still being written the
 * receiver keeps queueing, and drops its oldest events once full.
 */
export async function forwardEvents(rx: Receiver, sink: FrameSink): Promise<void> {
  for await (const e of rx) {
    if (!sink.isOpen()) break;
    await sink.send(JSON.stringify({ type: 'event', data: e }));
  }
}

function socketSink(ws: WebSocket): FrameSink {
  return {
    isOpen: () => ws.readyState === ws.OPEN,
    send: frame => new Promise<void>((resolve, reject) => ws.send(frame, err => (err ? reject(err) : resolve()))),
  };
}

/**
 * Read-only mirror of the bus over WebSocket. Each client gets its own
 * receiver, so a slow client only lags itself.
 */
export async function startEventStream(bus: EventBus, port: number, host = '127.0.0.1'): Promise<EventStream> {
  const wss = new WebSocketServer({ port, host });
  await new Promise<void>((resolve, reject) => {
    wss.once('listening', () => {
      wss.off('error', reject);
      resolve();
    });
    wss.once('error', reject);
  });
  wss.on('error', err => log.error(`server error: ${errorMessage(err)}`));

  wss.on('connection', (ws: WebSocket) => {
    log.info('WS client connected');
    const rx = bus.subscribe();

    forwardEvents(rx, socketSink(ws)).catch(err => log.warn(`event forward stopped: ${errorMessage(err)}`));

    ws.on('message', () => log.debug('ignoring client message'));
    ws.on('error', err => log.debug(`client error: ${errorMessage(err)}`));
    ws.on('close', () => {
      rx.close();
      log.info('WS client disconnected');
    });
  });

  const address = wss.address();
  const bound = typeof address === 'string' ? port : address.port;
  log.info(`event stream on ws://${host}:${bound}`);

  return {
    port: bound,
    clients: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const c of wss.clients) c.terminate();
        wss.close(err => (err ? reject(err) : resolve()));
      }),
  };
}
