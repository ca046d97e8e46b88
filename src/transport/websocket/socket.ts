/**
 * Minimal socket seam between the WebSocket client and the `ws` package.
 * Tests replace the factory with an in-process fake.
 *
 * @module transport/websocket/socket
 */

import WebSocket from 'ws';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(reason?: string): void;
  onError(error: Error): void;
}

export interface SocketConnection {
  /** Resolves once the frame is written */
  send(data: string): Promise<void>;
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketConnection;

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);

  socket.on('open', () => handlers.onOpen());
  socket.on('message', (data) => handlers.onMessage(rawDataToText(data)));
  socket.on('close', (code, reason) => handlers.onClose(`${code}${reason.length ? ` ${reason.toString('utf8')}` : ''}`));
  socket.on('error', (error) => handlers.onError(error));

  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error('Socket is not open'));
          return;
        }
        socket.send(data, (error) => (error ? reject(error) : resolve()));
      }),
    close: () => socket.close(),
  };
};
