import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { z } from 'zod';
import type {
  ConnectionState,
  MusicConfigUpdate,
  PlaybackControl,
  WeightedPrompt,
} from './types';
import type { AudioSink } from './audio-sink';
import {
  buildStreamingUrl,
  DEFAULT_STREAMING_API_VERSION,
  DEFAULT_STREAMING_BASE_URL,
  DEFAULT_STREAMING_MODEL,
} from './config';
import { describeError, SessionError } from './session-errors';
import { WAVE_GOVERNANCE } from './wave-governance-constants';

const SOCKET_OPEN = WebSocket.OPEN;
const NORMAL_CLOSURE = 1000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** The subset of a `ws` client the streaming client relies on. */
export interface StreamingSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number): void;
  terminate(): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData | string) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
}

export type SocketFactory = (url: string) => StreamingSocket;

export const createWebSocket: SocketFactory = (url) => new WebSocket(url);

type ClientMessage =
  | { setup: { model: string } }
  | { clientContent: { weightedPrompts: WeightedPrompt[] } }
  | { musicGenerationConfig: MusicConfigUpdate & { temperature: number } }
  | { playbackControl: PlaybackControl };

const serverFrameSchema = z.object({
  setupComplete: z.object({}).passthrough().optional(),
  serverContent: z
    .object({
      audioChunks: z.array(z.object({ data: z.string().optional() }).passthrough()).optional(),
    })
    .passthrough()
    .optional(),
  error: z.object({ message: z.string().optional() }).passthrough().optional(),
});

type ServerFrame = z.infer<typeof serverFrameSchema>;

export interface StreamingClientOptions {
  sink: AudioSink;
  baseUrl?: string;
  apiVersion?: string;
  model?: string;
  connectTimeoutMs?: number;
  createSocket?: SocketFactory;
}

export interface StreamingClient {
  on(event: 'state', listener: (state: ConnectionState) => void): this;
  off(event: 'state', listener: (state: ConnectionState) => void): this;
}

/**
 * Owns the bidirectional connection to the music generation backend.
 *
 * `connect()` replaces any previous connection and resolves once the setup
 * exchange succeeds (true) or fails or is cancelled (false). Every socket
 * callback is tagged with the generation that created it, so events from a
 * torn-down socket are ignored. Nothing here reconnects on its own.
 */
export class StreamingClient extends EventEmitter {
  private connection: ConnectionState = { status: 'disconnected' };
  private socket: StreamingSocket | null = null;
  private generation = 0;
  private handshakeTimer: NodeJS.Timeout | null = null;
  private settleHandshake: ((connected: boolean) => void) | null = null;
  private readonly sink: AudioSink;
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly model: string;
  private readonly connectTimeoutMs: number;
  private readonly createSocket: SocketFactory;

  constructor(options: StreamingClientOptions) {
    super();
    this.sink = options.sink;
    this.baseUrl = options.baseUrl ?? DEFAULT_STREAMING_BASE_URL;
    this.apiVersion = options.apiVersion ?? DEFAULT_STREAMING_API_VERSION;
    this.model = options.model ?? DEFAULT_STREAMING_MODEL;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.createSocket = options.createSocket ?? createWebSocket;
  }

  get state(): ConnectionState {
    return this.connection;
  }

  get isConnected(): boolean {
    return this.connection.status === 'connected';
  }

  // ─── Connection ─────────────────────────────────────────────────────

  connect(apiKey: string): Promise<boolean> {
    this.disconnect();
    const generation = ++this.generation;
    this.setState({ status: 'connecting' });
    console.log(`[StreamingClient] Connecting (${this.model})`);

    return new Promise<boolean>((resolve) => {
      this.settleHandshake = resolve;

      let socket: StreamingSocket;
      try {
        socket = this.createSocket(
          buildStreamingUrl({ streamingBaseUrl: this.baseUrl, streamingApiVersion: this.apiVersion }, apiKey)
        );
      } catch (err) {
        this.fail(new SessionError('connection_error', describeError(err), { cause: err }));
        return;
      }

      this.socket = socket;
      this.handshakeTimer = setTimeout(() => {
        if (!this.isCurrent(socket, generation)) return;
        this.fail(new SessionError(
          'connection_error',
          `Handshake timed out after ${this.connectTimeoutMs}ms`
        ));
      }, this.connectTimeoutMs);

      this.attach(socket, generation);
    });
  }

  /** Closes the connection from any state and stops the sink. */
  disconnect(): void {
    const settle = this.settleHandshake;
    const hadSocket = this.socket !== null;
    this.teardown();
    this.setState({ status: 'disconnected' });
    this.sink.stop();
    if (hadSocket) {
      console.log('[StreamingClient] Disconnected');
    }
    settle?.(false);
  }

  // ─── Commands ───────────────────────────────────────────────────────

  setPrompts(prompts: readonly WeightedPrompt[]): Promise<void> {
    return this.send('weighted prompts', {
      clientContent: { weightedPrompts: prompts.map((p) => ({ text: p.text, weight: p.weight })) },
    });
  }

  setMusicConfig(update: MusicConfigUpdate): Promise<void> {
    const config: MusicConfigUpdate & { temperature: number } = {
      temperature: update.temperature ?? WAVE_GOVERNANCE.DEFAULT_TEMPERATURE,
    };
    if (update.bpm !== undefined) config.bpm = update.bpm;
    if (update.density !== undefined) config.density = update.density;
    if (update.brightness !== undefined) config.brightness = update.brightness;
    return this.send('music config', { musicGenerationConfig: config });
  }

  play(): Promise<void> {
    return this.sendControl('PLAY');
  }

  pause(): Promise<void> {
    return this.sendControl('PAUSE');
  }

  stop(): Promise<void> {
    return this.sendControl('STOP');
  }

  /** Tells the backend to drop its generation history. Required after a large tempo jump. */
  resetContext(): Promise<void> {
    return this.sendControl('RESET_CONTEXT');
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private sendControl(control: PlaybackControl): Promise<void> {
    return this.send(control, { playbackControl: control });
  }

  /** Best-effort send. Failures are logged and never change the connection state. */
  private send(label: string, message: ClientMessage): Promise<void> {
    const socket = this.socket;
    if (!socket || this.connection.status !== 'connected' || socket.readyState !== SOCKET_OPEN) {
      console.warn(`[StreamingClient] Not connected (${this.connection.status}), dropping ${label}`);
      return Promise.resolve();
    }
    return this.write(socket, label, message);
  }

  private write(socket: StreamingSocket, label: string, message: ClientMessage): Promise<void> {
    return new Promise<void>((resolve) => {
      const onSent = (err?: Error) => {
        if (err) {
          console.error(`[StreamingClient] Failed to send ${label}:`, err.message);
        }
        resolve();
      };
      try {
        socket.send(JSON.stringify(message), onSent);
      } catch (err) {
        onSent(new SessionError('send_failure', describeError(err), { cause: err }));
      }
    });
  }

  private attach(socket: StreamingSocket, generation: number): void {
    socket.on('open', () => {
      if (!this.isCurrent(socket, generation)) return;
      void this.write(socket, 'setup', { setup: { model: this.model } });
    });

    socket.on('message', (data) => {
      if (!this.isCurrent(socket, generation)) return;
      const frame = parseFrame(data);
      if (this.settleHandshake) {
        this.completeHandshake(frame);
        return;
      }
      if (frame) this.handleFrame(frame);
    });

    socket.on('error', (error) => {
      if (!this.isCurrent(socket, generation)) return;
      this.fail(new SessionError('connection_error', error.message || 'WebSocket error', { cause: error }));
    });

    socket.on('close', (code) => {
      if (!this.isCurrent(socket, generation)) return;
      const phase = this.settleHandshake ? 'during handshake' : 'unexpectedly';
      this.fail(new SessionError('connection_error', `Connection closed ${phase} (code ${code})`));
    });
  }

  private completeHandshake(frame: ServerFrame | null): void {
    if (frame?.error) {
      this.fail(new SessionError('backend_error', frame.error.message ?? 'Unknown API error'));
      return;
    }
    if (!frame?.setupComplete) {
      console.warn('[StreamingClient] Ignoring frame received before setup completed');
      return;
    }
    const settle = this.settleHandshake;
    this.settleHandshake = null;
    this.clearHandshakeTimer();
    this.setState({ status: 'connected' });
    console.log('[StreamingClient] Connected');
    settle?.(true);
  }

  private handleFrame(frame: ServerFrame): void {
    const chunks = frame.serverContent?.audioChunks;
    if (chunks) {
      for (const chunk of chunks) {
        if (!chunk.data) continue;
        const pcm = Buffer.from(chunk.data, 'base64');
        if (pcm.byteLength === 0) continue;
        this.sink.enqueue(pcm);
      }
    }
    if (frame.error) {
      this.fail(new SessionError('backend_error', frame.error.message ?? 'Unknown API error'));
    }
  }

  private fail(error: SessionError): void {
    const settle = this.settleHandshake;
    this.teardown();
    console.error(`[StreamingClient] ${error.code}: ${error.message}`);
    this.setState({ status: 'error', message: error.message });
    settle?.(false);
  }

  private teardown(): void {
    this.generation++;
    this.settleHandshake = null;
    this.clearHandshakeTimer();
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    try {
      if (socket.readyState === SOCKET_OPEN) {
        socket.close(NORMAL_CLOSURE);
      } else {
        socket.terminate();
      }
    } catch (err) {
      console.warn('[StreamingClient] Error while closing socket:', describeError(err));
    }
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
  }

  private isCurrent(socket: StreamingSocket, generation: number): boolean {
    return this.socket === socket && this.generation === generation;
  }

  private setState(next: ConnectionState): void {
    if (sameState(this.connection, next)) return;
    this.connection = next;
    this.emit('state', next);
  }
}

function sameState(a: ConnectionState, b: ConnectionState): boolean {
  if (a.status === 'error' && b.status === 'error') return a.message === b.message;
  return a.status === b.status;
}

function rawDataToString(data: WebSocket.RawData | string): string {
  if (typeof data === 'string') return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/** Malformed or unrecognised frames come back as null and are dropped. */
function parseFrame(data: WebSocket.RawData | string): ServerFrame | null {
  let json: unknown;
  try {
    json = JSON.parse(rawDataToString(data));
  } catch {
    return null;
  }
  const parsed = serverFrameSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
