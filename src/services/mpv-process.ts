/**
 * mpv Process
 *
 * AudioProcess backed by an mpv child process controlled over its JSON IPC
 * socket. The process is spawned on the first load and respawned on the
 * next load after it exits.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import type { AudioProcessEvent } from '../types/index.js';
import type { AudioProcess, AudioProcessListener } from './audio-process.js';
import { sleep } from './deadline.js';
import { errorMessage, PlaybackLaunchError } from './errors.js';
import { isRecord } from './validation.js';

const CACHE_PROPERTY_ID = 1;
const CONNECT_RETRY_MS = 100;

export interface MpvProcessOptions {
  mpvPath: string;
  extraArgs?: string[];
  /** IPC socket location; defaults to a per-process path in the temp dir */
  socketPath?: string;
  /** How long to wait for the IPC socket after spawning */
  startTimeoutMs?: number;
  debug?: boolean;
}

type MpvCommand = Array<string | number | boolean>;

interface PendingRequest {
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
}

/**
 * Parse one line from the IPC socket. Returns null for blank or non-JSON
 * lines.
 */
export function parseMpvLine(line: string): Record<string, unknown> | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Translates raw mpv events into AudioProcessEvents, keeping track of which
 * load tag each playlist entry belongs to.
 */
export class MpvEventMapper {
  private pendingTag: string | null = null;
  private readonly entryTags = new Map<number, string>();
  private currentTag: string | null = null;

  /**
   * Register the tag for the file about to be loaded. Every load replaces the
   * playlist, so a newer tag supersedes one whose file never started.
   */
  expect(tag: string): void {
    this.pendingTag = tag;
  }

  /** Drop a pending tag whose load was never accepted. */
  forget(tag: string): void {
    if (this.pendingTag === tag) this.pendingTag = null;
  }

  /** Tag of the file mpv is currently on, if any. */
  get activeTag(): string | null {
    return this.currentTag;
  }

  reset(): void {
    this.pendingTag = null;
    this.entryTags.clear();
    this.currentTag = null;
  }

  map(message: Record<string, unknown>): AudioProcessEvent | null {
    const entryId = typeof message.playlist_entry_id === 'number' ? message.playlist_entry_id : null;

    switch (message.event) {
      case 'start-file': {
        const tag = this.pendingTag ?? this.currentTag;
        this.pendingTag = null;
        if (tag !== null && entryId !== null) this.entryTags.set(entryId, tag);
        this.currentTag = tag;
        return null;
      }
      case 'playback-restart':
        return this.currentTag === null ? null : { type: 'started', tag: this.currentTag };
      case 'property-change': {
        if (message.id !== CACHE_PROPERTY_ID || this.currentTag === null) return null;
        if (message.data === true) return { type: 'stalled', tag: this.currentTag };
        if (message.data === false) return { type: 'resumed', tag: this.currentTag };
        return null;
      }
      case 'end-file': {
        const tag = (entryId !== null ? this.entryTags.get(entryId) : undefined) ?? this.currentTag;
        if (entryId !== null) this.entryTags.delete(entryId);
        if (tag === this.currentTag) this.currentTag = null;
        if (tag === null) return null;

        if (message.reason === 'eof') return { type: 'finished', tag };
        if (message.reason === 'error') {
          const reason = typeof message.file_error === 'string' ? message.file_error : 'playback error';
          return { type: 'error', tag, reason };
        }
        // 'stop', 'quit' and 'redirect' are caused by our own commands.
        return null;
      }
      default:
        return null;
    }
  }
}

/**
 * Audio player running as an mpv child process.
 */
export class MpvProcess implements AudioProcess {
  private child: ChildProcess | null = null;
  private socket: net.Socket | null = null;
  private starting: Promise<void> | null = null;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly listeners = new Set<AudioProcessListener>();
  private readonly mapper = new MpvEventMapper();
  private readonly socketPath: string;
  private nextRequestId = 1;
  private volume = 100;
  private disposed = false;

  constructor(private readonly options: MpvProcessOptions) {
    this.socketPath =
      options.socketPath ?? path.join(os.tmpdir(), `tapedeck-mpv-${process.pid}-${Date.now()}.sock`);
  }

  async load(url: string, tag: string): Promise<void> {
    await this.ensureStarted();
    this.mapper.expect(tag);
    try {
      await this.command(['loadfile', url, 'replace']);
    } catch (error) {
      this.mapper.forget(tag);
      throw error;
    }
  }

  async play(): Promise<void> {
    if (!this.socket) return;
    await this.command(['set_property', 'pause', false]);
  }

  async pause(): Promise<void> {
    if (!this.socket) return;
    await this.command(['set_property', 'pause', true]);
  }

  async stop(): Promise<void> {
    if (!this.socket) return;
    await this.command(['stop']);
  }

  async seek(offsetSec: number): Promise<void> {
    if (!this.socket) return;
    await this.command(['seek', Math.max(0, offsetSec), 'absolute']);
  }

  async setVolume(percent: number): Promise<void> {
    this.volume = percent;
    if (!this.socket) return;
    await this.command(['set_property', 'volume', percent]);
  }

  subscribe(listener: AudioProcessListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    const child = this.child;
    if (this.socket) {
      try {
        await this.command(['quit']);
      } catch {
        // The process may already be gone.
      }
    }
    this.teardown(new PlaybackLaunchError('Player disposed'));
    child?.kill();
    this.listeners.clear();
  }

  // ============================================================
  // Process lifecycle
  // ============================================================

  private ensureStarted(): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new PlaybackLaunchError('Player has been disposed'));
    }
    if (this.socket) return Promise.resolve();
    if (!this.starting) {
      this.starting = this.start().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async start(): Promise<void> {
    const args = [
      '--idle=yes',
      '--no-video',
      '--no-terminal',
      `--input-ipc-server=${this.socketPath}`,
      ...(this.options.extraArgs ?? []),
    ];
    this.debug(`Spawning ${this.options.mpvPath} ${args.join(' ')}`);

    const child = spawn(this.options.mpvPath, args, { stdio: 'ignore' });
    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (error) =>
        reject(new PlaybackLaunchError(`Could not start ${this.options.mpvPath}: ${error.message}`, { cause: error })),
      );
    });

    this.child = child;
    child.once('exit', (code, signal) => this.handleExit(child, code, signal));

    let socket: net.Socket;
    try {
      socket = await this.connect(Date.now() + (this.options.startTimeoutMs ?? 5000));
    } catch (error) {
      child.kill();
      throw error;
    }

    this.socket = socket;
    const lines = readline.createInterface({ input: socket });
    lines.on('line', (line) => this.handleLine(line));
    socket.on('error', (error) => {
      console.warn('[mpv] IPC socket error:', error.message);
    });

    try {
      await this.command(['observe_property', CACHE_PROPERTY_ID, 'paused-for-cache']);
      await this.command(['set_property', 'volume', this.volume]);
    } catch (error) {
      this.teardown(new PlaybackLaunchError('Player setup failed', { cause: error }));
      child.kill();
      throw new PlaybackLaunchError(`Could not set up ${this.options.mpvPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async connect(deadline: number): Promise<net.Socket> {
    for (;;) {
      try {
        return await new Promise<net.Socket>((resolve, reject) => {
          const socket = net.createConnection(this.socketPath);
          socket.once('connect', () => {
            socket.removeListener('error', reject);
            resolve(socket);
          });
          socket.once('error', reject);
        });
      } catch (error) {
        if (Date.now() >= deadline) {
          throw new PlaybackLaunchError(`mpv IPC socket did not come up: ${errorMessage(error)}`, { cause: error });
        }
        await sleep(CONNECT_RETRY_MS);
      }
    }
  }

  private handleExit(child: ChildProcess, code: number | null, signal: NodeJS.Signals | null): void {
    if (this.child !== child) return;

    const activeTag = this.mapper.activeTag;
    this.teardown(new PlaybackLaunchError('Player process exited'));
    if (this.disposed) return;

    console.warn(`[mpv] Player exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`);
    if (activeTag !== null) {
      this.emit({ type: 'error', tag: activeTag, reason: 'player process exited' });
    }
  }

  private teardown(reason: Error): void {
    for (const request of this.pending.values()) {
      request.reject(reason);
    }
    this.pending.clear();
    this.socket?.destroy();
    this.socket = null;
    this.child = null;
    this.mapper.reset();
  }

  // ============================================================
  // IPC
  // ============================================================

  private command(command: MpvCommand): Promise<unknown> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new PlaybackLaunchError('Player is not running'));
    }

    const requestId = this.nextRequestId++;
    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(requestId, { resolve, reject });
      socket.write(`${JSON.stringify({ command, request_id: requestId })}\n`, (error) => {
        if (error && this.pending.delete(requestId)) {
          reject(new PlaybackLaunchError(`Could not send ${String(command[0])}: ${error.message}`, { cause: error }));
        }
      });
    });
  }

  private handleLine(line: string): void {
    const message = parseMpvLine(line);
    if (!message) return;

    if (typeof message.request_id === 'number' && message.event === undefined) {
      const request = this.pending.get(message.request_id);
      if (!request) return;
      this.pending.delete(message.request_id);
      if (message.error === 'success') {
        request.resolve(message.data);
      } else {
        request.reject(new Error(`mpv: ${String(message.error)}`));
      }
      return;
    }

    const event = this.mapper.map(message);
    if (event) this.emit(event);
  }

  private emit(event: AudioProcessEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (e) {
        console.error('[mpv] Event listener error:', e);
      }
    }
  }

  private debug(message: string): void {
    if (this.options.debug) {
      console.debug(`[mpv] ${message}`);
    }
  }
}
