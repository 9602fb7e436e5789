import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import log from 'electron-log/node';
import which from 'which';

export class FFmpegError extends Error {
  readonly stderr: string;

  constructor(message: string, stderr = '') {
    super(message);
    this.name = 'FFmpegError';
    this.stderr = stderr;
  }
}

export interface FFmpegContext {
  readonly tempDir: string;
  readonly ffmpegPath: string;
  readonly ffprobePath: string;
  run(args: string[], opts?: RunOpts): Promise<void>;
  getMediaDuration(file: string, signal?: AbortSignal): Promise<number>;
  hasAudioTrack(file: string): Promise<boolean>;
}

export interface RunOpts {
  operationId?: string;
  totalDuration?: number;
  progress?: (pct: number) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

function pickBinary(configured: string | undefined, fallbackName: string) {
  // 1. explicitly configured path
  if (configured) {
    if (!fs.existsSync(configured)) {
      throw new Error(`${fallbackName} not found at ${configured}`);
    }
    return configured;
  }

  // 2. user PATH
  const p = which.sync(fallbackName, { nothrow: true });
  if (p) return p;

  throw new Error(`${fallbackName} executable not available`);
}

export function parseProgressTime(line: string): number | null {
  const m = line.match(/time=(\d{2}):(\d{2}):(\d{2})(?:\.(\d{2}))?/);
  if (!m) return null;
  const [, hh, mm, ss, cs = '0'] = m;
  return +hh * 3600 + +mm * 60 + +ss + +cs / 100;
}

export function createFFmpegContext({
  tempDir: tempDirPath,
  ffmpegPath: configuredFfmpeg,
  ffprobePath: configuredFfprobe,
}: {
  tempDir: string;
  ffmpegPath?: string;
  ffprobePath?: string;
}): FFmpegContext {
  const ffmpegPath = pickBinary(configuredFfmpeg, 'ffmpeg');
  const ffprobePath = pickBinary(configuredFfprobe, 'ffprobe');
  log.info(`[ffmpeg-runner] ffmpeg => ${ffmpegPath}, ffprobe => ${ffprobePath}`);

  if (!tempDirPath)
    throw new Error('createFFmpegContext requires a tempDirPath');
  const tempDir = path.resolve(tempDirPath);
  if (!fs.existsSync(tempDir)) {
    fs.mkdirSync(tempDir, { recursive: true });
    log.info(`[ffmpeg-runner] created temp directory: ${tempDir}`);
  }

  async function run(args: string[], opts: RunOpts = {}): Promise<void> {
    const { operationId, totalDuration, progress, cwd, env, signal } = opts;
    const tag = `[ffmpeg ${operationId ?? 'no-id'}]`;
    if (signal?.aborted) throw new FFmpegError('Operation aborted');

    log.info(tag, `${ffmpegPath} ${args.join(' ')}`);
    const child = spawn(ffmpegPath, args, {
      env: env ?? process.env,
      cwd: cwd ?? tempDir,
    });

    const stderrBuf: string[] = [];

    child.stderr.on('data', d => {
      const line = d.toString();
      stderrBuf.push(line);
      if (!line.startsWith('frame=') && !line.startsWith('size=')) {
        log.debug(`${tag} stderr: ${line.trim()}`);
      }
      if (totalDuration && progress) {
        const cur = parseProgressTime(line);
        if (cur !== null) progress(Math.min(100, (cur / totalDuration) * 100));
      }
    });

    if (signal) {
      const abort = () => {
        if (!child.killed)
          child.kill(process.platform === 'win32' ? 'SIGTERM' : 'SIGINT');
      };
      if (signal.aborted) {
        abort();
      } else {
        signal.addEventListener('abort', abort, { once: true });
      }
      child.once('close', () => signal.removeEventListener('abort', abort));
    }

    return new Promise<void>((resolve, reject) => {
      child.on('error', err => done(new FFmpegError(err.message)));
      child.on('close', code => {
        if (code === 0) done();
        else
          done(
            new FFmpegError(
              `ffmpeg exited with code ${code}`,
              stderrBuf.join('')
            )
          );
      });

      function done(err?: FFmpegError) {
        if (err) {
          log.error(`${tag} Error:`, err.message);
          if (err.stderr) log.error(`${tag} Stderr Output:\n${err.stderr}`);
          reject(err);
        } else resolve();
      }
    });
  }

  function getMediaDuration(
    file: string,
    signal?: AbortSignal
  ): Promise<number> {
    return new Promise((resolve, reject) => {
      const args = [
        '-v',
        'error',
        '-show_entries',
        'format=duration',
        '-of',
        'default=noprint_wrappers=1:nokey=1',
        file,
      ];
      const p = spawn(ffprobePath, args);
      let out = '';
      let err = '';
      p.stdout.on('data', d => (out += d));
      p.stderr.on('data', d => (err += d));
      if (signal) {
        const abort = () => !p.killed && p.kill();
        if (signal.aborted) {
          abort();
        } else {
          signal.addEventListener('abort', abort, { once: true });
        }
        p.once('close', () => signal.removeEventListener('abort', abort));
      }
      p.on('error', e => reject(new FFmpegError(e.message)));
      p.on('close', c => {
        if (c === 0) {
          const sec = parseFloat(out.trim());
          return isNaN(sec)
            ? reject(new FFmpegError('could not parse duration', err))
            : resolve(sec);
        }
        reject(new FFmpegError(`ffprobe exited with ${c}`, err));
      });
    });
  }

  function hasAudioTrack(file: string): Promise<boolean> {
    return new Promise(res => {
      const p = spawn(ffprobePath, [
        '-v',
        'error',
        '-select_streams',
        'a',
        '-show_entries',
        'stream=index',
        '-of',
        'csv=p=0',
        file,
      ]);
      let out = '';
      p.stdout.on('data', d => (out += d));
      p.on('error', () => res(false));
      p.on('close', () => res(out.trim().length > 0));
    });
  }

  return {
    tempDir,
    ffmpegPath,
    ffprobePath,
    run,
    getMediaDuration,
    hasAudioTrack,
  };
}
