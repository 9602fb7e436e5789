import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  createFFmpegContext,
  parseProgressTime,
} from '../../packages/main/services/ffmpeg-runner';
import { writeStubBinaries } from '../helpers/stub-binaries';

describe('parseProgressTime', () => {
  it('reads the time= field of a progress line', () => {
    expect(parseProgressTime('frame=  10 size=1kB time=00:01:02.50 bitrate=1')).toBe(62.5);
    expect(parseProgressTime('Stream #0:0: Audio')).toBeNull();
  });
});

describe('createFFmpegContext', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'ffmpeg-ctx-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function context() {
    return createFFmpegContext({
      tempDir: path.join(root, 'tmp'),
      ...writeStubBinaries(path.join(root, 'bin')),
    });
  }

  it('probes duration and detaches from the abort signal afterwards', async () => {
    const ctx = context();
    const controller = new AbortController();
    const remove = jest.spyOn(controller.signal, 'removeEventListener');

    await expect(ctx.getMediaDuration('lecture.mp4', controller.signal)).resolves.toBe(10);
    expect(remove).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('detaches run from the abort signal once ffmpeg exits', async () => {
    const ctx = context();
    const controller = new AbortController();
    const remove = jest.spyOn(controller.signal, 'removeEventListener');
    const input = path.join(root, 'in.mp4');
    fs.writeFileSync(input, '');

    await ctx.run(['-i', input, path.join(root, 'out.mp4')], {
      signal: controller.signal,
    });

    expect(fs.existsSync(path.join(root, 'out.mp4'))).toBe(true);
    expect(remove).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('rejects with stderr when ffmpeg fails', async () => {
    const ctx = context();
    const missing = path.join(root, 'missing.mp4');
    const error = await ctx.run(['-i', missing, path.join(root, 'out.mp4')]).then(
      () => null,
      (e: unknown) => e
    );
    expect(error).toMatchObject({
      message: 'ffmpeg exited with code 1',
      stderr: `${missing}: No such file or directory\n`,
    });
  });
});
