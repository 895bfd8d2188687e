/**
 * mpv IPC Client - JSON IPC over mpv's --input-ipc-server socket
 *
 * PROTOCOL: newline-delimited JSON both ways.
 *   out: {"command": [...], "request_id": n, "async": true}
 *   in:  {"event": "...", ...}  or  {"request_id": n, "error": "success", "data": ...}
 *
 * Everything received is turned into a Signal and pushed into the channel;
 * replies to our own commands settle the promise registered under their
 * request_id. Nothing here calls into the engine.
 *
 * Control messages are addressed to this client as
 *   script-message <client-name> <command> [args...]
 */

import { createConnection, type Socket } from 'net';
import type { PlayerClient } from '../types/backends';
import type { NodeValue, Signal } from '../types/signals';
import { isNodeMap } from '../types/signals';
import type { Logger } from '../lib/logger';
import { resolveProperty } from '../lib/observed-properties';
import type { SignalChannel } from '../lib/signal-channel';

// ---------------------------------------------------------------------------
// Wire messages
// ---------------------------------------------------------------------------

export type IpcMessage =
  | { type: 'event'; event: string; fields: { [key: string]: NodeValue } }
  | { type: 'reply'; requestId: number; error: string; data: NodeValue | undefined };

/**
 * Decode one line from the socket. Returns null for blank lines, invalid
 * JSON and messages that are neither an event nor a reply.
 */
export function decodeIpcLine(line: string): IpcMessage | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let parsed: NodeValue;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  if (!isNodeMap(parsed)) return null;

  const event = parsed['event'];
  if (typeof event === 'string') {
    return { type: 'event', event, fields: parsed };
  }

  const requestId = parsed['request_id'];
  const error = parsed['error'];
  if (typeof requestId === 'number' && typeof error === 'string') {
    return { type: 'reply', requestId, error, data: parsed['data'] };
  }

  return null;
}

/**
 * Translate an mpv event into the engine's signal, or null if it is not one
 * the engine consumes.
 */
export function eventToSignal(event: string, fields: { [key: string]: NodeValue }, clientName: string): Signal | null {
  switch (event) {
    case 'property-change': {
      const name = fields['name'];
      const property = typeof name === 'string' ? resolveProperty(name) : undefined;
      if (!property) return null;
      return { kind: 'property-change', name: property, value: fields['data'] };
    }

    case 'client-message': {
      const args = fields['args'];
      if (!Array.isArray(args)) return null;
      const strings = args.filter((arg): arg is string => typeof arg === 'string');
      if (strings[0] !== clientName) return null;
      return { kind: 'client-message', args: strings.slice(1) };
    }

    case 'video-reconfig':
      return { kind: 'player-event', event: 'video-reconfig' };

    case 'seek':
      return { kind: 'player-event', event: 'seek' };

    case 'shutdown':
      return { kind: 'shutdown', reason: 'player shutdown' };

    default:
      return null;
  }
}

export function encodeCommand(command: NodeValue[], requestId?: number, async = false): string {
  const message: { [key: string]: NodeValue } = { command };
  if (requestId !== undefined) message['request_id'] = requestId;
  if (async) message['async'] = true;
  return `${JSON.stringify(message)}\n`;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class IpcCommandError extends Error {
  constructor(command: string, reason: string) {
    super(`${command}: ${reason}`);
    this.name = 'IpcCommandError';
  }
}

interface PendingReply {
  command: string;
  resolve: (data: NodeValue | undefined) => void;
  reject: (error: Error) => void;
}

export interface MpvIpcClientOptions {
  socketPath: string;
  clientName: string;
  channel: SignalChannel;
  logger: Logger;
}

export class MpvIpcClient implements PlayerClient {
  private readonly socketPath: string;
  private readonly clientName: string;
  private readonly channel: SignalChannel;
  private readonly logger: Logger;

  private socket: Socket | null = null;
  private buffer = '';
  private nextRequestId = 1;
  private readonly pending = new Map<number, PendingReply>();

  constructor(options: MpvIpcClientOptions) {
    this.socketPath = options.socketPath;
    this.clientName = options.clientName;
    this.channel = options.channel;
    this.logger = options.logger;
  }

  /**
   * Open the socket. Rejects if the player is not listening.
   */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = createConnection(this.socketPath);
      socket.setEncoding('utf8');

      const onConnectError = (error: Error): void => {
        socket.destroy();
        reject(error);
      };

      socket.once('error', onConnectError);
      socket.once('connect', () => {
        socket.off('error', onConnectError);
        socket.on('error', error => this.logger.error('ipc socket error', error));
        socket.on('data', (chunk: string) => this.onData(chunk));
        socket.on('close', () => this.onClose());
        this.socket = socket;
        resolve();
      });
    });
  }

  close(): void {
    this.socket?.end();
    this.socket = null;
  }

  observe(id: number, name: string): void {
    this.send(['observe_property', id, name]);
  }

  unobserve(id: number): void {
    this.send(['unobserve_property', id]);
  }

  requestTextExpansion(requestId: number, template: string): void {
    this.command(['expand-text', template])
      .then(data => {
        this.channel.push({ kind: 'text-expanded', requestId, text: typeof data === 'string' ? data : null });
      })
      .catch((error: unknown) => {
        this.logger.verbose(`expand-text failed: ${error instanceof Error ? error.message : String(error)}`);
        this.channel.push({ kind: 'text-expanded', requestId, text: null });
      });
  }

  /** screenshot-to-file as an async command; resolves once the file is written */
  async screenshotToFile(path: string, flags: string): Promise<void> {
    await this.command(['screenshot-to-file', path, flags], true);
  }

  getProperty(name: string): Promise<NodeValue | undefined> {
    return this.command(['get_property', name]);
  }

  /**
   * Run a command and wait for its reply. Rejects with IpcCommandError when
   * mpv reports anything but success.
   */
  command(args: NodeValue[], async = false): Promise<NodeValue | undefined> {
    const requestId = this.nextRequestId++;
    const name = String(args[0]);

    return new Promise((resolve, reject) => {
      if (!this.socket) {
        reject(new IpcCommandError(name, 'not connected'));
        return;
      }
      this.pending.set(requestId, { command: name, resolve, reject });
      this.socket.write(encodeCommand(args, requestId, async));
    });
  }

  private send(args: NodeValue[]): void {
    if (!this.socket) {
      this.logger.error(`ipc not connected, dropping ${String(args[0])}`);
      return;
    }
    this.socket.write(encodeCommand(args));
  }

  private onData(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      this.onLine(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private onLine(line: string): void {
    const message = decodeIpcLine(line);
    if (!message) return;

    if (message.type === 'reply') {
      const pending = this.pending.get(message.requestId);
      if (!pending) return;
      this.pending.delete(message.requestId);

      if (message.error === 'success') {
        pending.resolve(message.data);
      } else {
        pending.reject(new IpcCommandError(pending.command, message.error));
      }
      return;
    }

    const signal = eventToSignal(message.event, message.fields, this.clientName);
    if (signal) {
      this.channel.push(signal);
    }
  }

  private onClose(): void {
    this.socket = null;
    for (const [id, pending] of this.pending) {
      pending.reject(new IpcCommandError(pending.command, 'connection closed'));
      this.pending.delete(id);
    }
    this.channel.close('ipc connection closed');
  }
}

export default MpvIpcClient;
