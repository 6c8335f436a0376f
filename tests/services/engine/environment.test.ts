import os from 'os';
import path from 'path';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { checkEnvironment } from '../../../src/services/engine/environment.js';
import { listEncoders, useFfmpegBinary } from '../../../src/services/engine/converter.js';
import { FatalEnvironmentError } from '../../../src/utils/errors.js';

vi.mock('../../../src/services/engine/converter.js', () => ({
  listEncoders: vi.fn(),
  useFfmpegBinary: vi.fn(),
}));

const lame = {
  type: 'audio',
  description: 'libmp3lame MP3 (MPEG audio layer 3)',
  frameMT: false,
  sliceMT: false,
  experimental: false,
  drawHorizBand: false,
  directRendering: true,
};

describe('checkEnvironment', () => {
  let dir: string;

  const fakeYtDlp = async (source: string): Promise<string> => {
    const script = path.join(dir, 'yt-dlp.cjs');
    await writeFile(script, `#!${process.execPath}\n${source}\n`, { mode: 0o755 });
    return script;
  };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'playlist-audio-dl-env-'));
    vi.mocked(listEncoders).mockReset();
    vi.mocked(useFfmpegBinary).mockReset();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report the yt-dlp version and the encoder in use', async () => {
    vi.mocked(listEncoders).mockResolvedValue({ libmp3lame: lame });
    const ytDlpPath = await fakeYtDlp("console.log('2024.08.06')");

    const report = await checkEnvironment({ ytDlpPath, ffmpegPath: '/opt/ffmpeg/bin/ffmpeg', format: 'mp3' });

    expect(report).toEqual({ ytDlpVersion: '2024.08.06', encoder: 'libmp3lame' });
    expect(useFfmpegBinary).toHaveBeenCalledWith('/opt/ffmpeg/bin/ffmpeg');
  });

  it('should leave the ffmpeg binary alone when none is given', async () => {
    vi.mocked(listEncoders).mockResolvedValue({ libmp3lame: lame });
    const ytDlpPath = await fakeYtDlp("console.log('2024.08.06')");

    await checkEnvironment({ ytDlpPath, format: 'mp3' });

    expect(useFfmpegBinary).not.toHaveBeenCalled();
  });

  it('should fail when yt-dlp cannot report its version', async () => {
    const ytDlpPath = await fakeYtDlp("console.error('ERROR: broken install'); process.exitCode = 2");

    await expect(checkEnvironment({ ytDlpPath, format: 'mp3' })).rejects.toThrow(
      `"${ytDlpPath} --version" failed: ERROR: broken install`
    );
    expect(listEncoders).not.toHaveBeenCalled();
  });

  it('should fail when yt-dlp is missing', async () => {
    await expect(
      checkEnvironment({ ytDlpPath: path.join(dir, 'no-such-yt-dlp'), format: 'mp3' })
    ).rejects.toBeInstanceOf(FatalEnvironmentError);
  });

  it('should fail when ffmpeg lacks the encoder the format needs', async () => {
    vi.mocked(listEncoders).mockResolvedValue({ libmp3lame: lame });
    const ytDlpPath = await fakeYtDlp("console.log('2024.08.06')");

    const error = await checkEnvironment({ ytDlpPath, format: 'opus' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FatalEnvironmentError);
    expect(error).toMatchObject({ message: 'ffmpeg has no "libopus" encoder, which opus output needs.' });
  });
});
