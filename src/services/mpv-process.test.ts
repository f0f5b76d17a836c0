import { promises as fs } from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PlaybackLaunchError } from './errors.js';
import { MpvEventMapper, MpvProcess, parseMpvLine } from './mpv-process.js';

describe('parseMpvLine', () => {
  it('parses JSON objects', () => {
    expect(parseMpvLine('{"event":"idle"}\n')).toEqual({ event: 'idle' });
  });

  it('skips blank and malformed lines', () => {
    expect(parseMpvLine('   ')).toBeNull();
    expect(parseMpvLine('not json')).toBeNull();
    expect(parseMpvLine('[1,2]')).toBeNull();
  });
});

describe('MpvEventMapper', () => {
  function loaded(tag: string, entryId: number): MpvEventMapper {
    const mapper = new MpvEventMapper();
    mapper.expect(tag);
    mapper.map({ event: 'start-file', playlist_entry_id: entryId });
    return mapper;
  }

  it('reports started once playback begins', () => {
    const mapper = loaded('1:1', 1);

    expect(mapper.activeTag).toBe('1:1');
    expect(mapper.map({ event: 'playback-restart' })).toEqual({ type: 'started', tag: '1:1' });
  });

  it('maps cache pauses to stalls and recoveries', () => {
    const mapper = loaded('1:1', 1);

    expect(mapper.map({ event: 'property-change', id: 1, name: 'paused-for-cache', data: true })).toEqual({
      type: 'stalled',
      tag: '1:1',
    });
    expect(mapper.map({ event: 'property-change', id: 1, name: 'paused-for-cache', data: false })).toEqual({
      type: 'resumed',
      tag: '1:1',
    });
  });

  it('reports a natural end of file as finished', () => {
    const mapper = loaded('1:1', 1);

    expect(mapper.map({ event: 'end-file', reason: 'eof', playlist_entry_id: 1 })).toEqual({
      type: 'finished',
      tag: '1:1',
    });
    expect(mapper.activeTag).toBeNull();
  });

  it('reports a failed file as an error with mpv\'s reason', () => {
    const mapper = loaded('1:1', 1);

    expect(
      mapper.map({ event: 'end-file', reason: 'error', file_error: 'loading failed', playlist_entry_id: 1 }),
    ).toEqual({ type: 'error', tag: '1:1', reason: 'loading failed' });
  });

  it('stays quiet when a file is stopped or replaced', () => {
    const mapper = loaded('1:1', 1);

    expect(mapper.map({ event: 'end-file', reason: 'stop', playlist_entry_id: 1 })).toBeNull();
  });

  it('attributes the end of a replaced file to its own tag', () => {
    const mapper = loaded('1:1', 1);
    mapper.expect('2:2');

    // mpv ends the old entry after the replacement was requested.
    expect(mapper.map({ event: 'end-file', reason: 'eof', playlist_entry_id: 1 })).toEqual({
      type: 'finished',
      tag: '1:1',
    });
    mapper.map({ event: 'start-file', playlist_entry_id: 2 });
    expect(mapper.activeTag).toBe('2:2');
  });

  it('tags the file mpv starts with the newest load when an earlier one never started', () => {
    const mapper = new MpvEventMapper();
    mapper.expect('1:1');
    mapper.expect('2:2');

    mapper.map({ event: 'start-file', playlist_entry_id: 2 });

    expect(mapper.map({ event: 'playback-restart' })).toEqual({ type: 'started', tag: '2:2' });
    expect(mapper.map({ event: 'end-file', reason: 'eof', playlist_entry_id: 2 })).toEqual({
      type: 'finished',
      tag: '2:2',
    });
  });

  it('drops a tag whose load was refused', () => {
    const mapper = new MpvEventMapper();
    mapper.expect('1:1');
    mapper.forget('1:1');
    mapper.expect('2:2');

    mapper.map({ event: 'start-file', playlist_entry_id: 1 });

    expect(mapper.activeTag).toBe('2:2');
  });

  it('ignores events before anything is loaded', () => {
    const mapper = new MpvEventMapper();

    expect(mapper.map({ event: 'playback-restart' })).toBeNull();
    expect(mapper.map({ event: 'end-file', reason: 'eof' })).toBeNull();
  });
});

describe('MpvProcess', () => {
  let dir: string;
  let server: net.Server | null = null;
  const connections: net.Socket[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tapedeck-mpv-'));
  });

  afterEach(async () => {
    for (const socket of connections.splice(0)) socket.destroy();
    const running = server;
    server = null;
    if (running) await new Promise<void>((resolve) => running.close(() => resolve()));
    await fs.rm(dir, { recursive: true, force: true });
  });

  function isRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }

  async function readPid(file: string): Promise<number> {
    const pid = Number((await fs.readFile(file, 'utf8')).trim());
    if (!Number.isInteger(pid) || pid <= 0) throw new Error(`No pid in ${file}`);
    return pid;
  }

  it('kills the player when setting it up over IPC fails', async () => {
    const socketPath = path.join(dir, 'ipc.sock');
    const pidFile = path.join(dir, 'player.pid');
    const player = path.join(dir, 'player.sh');
    await fs.writeFile(player, `#!/bin/sh\necho $$ > "${pidFile}"\nexec sleep 30\n`, { mode: 0o755 });

    // Answers every command with an error once the player has started.
    const refuse = async (socket: net.Socket, requestId: number): Promise<void> => {
      await vi.waitFor(() => readPid(pidFile));
      socket.write(`${JSON.stringify({ request_id: requestId, error: 'property unavailable' })}\n`);
    };
    const listening = net.createServer((socket) => {
      connections.push(socket);
      readline.createInterface({ input: socket }).on('line', (line) => {
        const request = parseMpvLine(line);
        if (request && typeof request.request_id === 'number') void refuse(socket, request.request_id);
      });
    });
    server = listening;
    await new Promise<void>((resolve) => listening.listen(socketPath, () => resolve()));

    const mpv = new MpvProcess({ mpvPath: player, socketPath });
    const error = await mpv.load('https://stream.test/t1', '1:1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlaybackLaunchError);
    expect(error).toMatchObject({ message: `Could not set up ${player}: mpv: property unavailable` });

    const pid = await readPid(pidFile);
    await vi.waitFor(() => expect(isRunning(pid)).toBe(false));
    await mpv.dispose();
  });
});
