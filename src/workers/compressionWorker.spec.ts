import * as fs from 'fs';
import * as path from 'path';
import { ErrorCode, RecordingError } from '../errors/vkycErrors';
import { makeTempDir, removeDir } from '../testUtils/fakes';
import { eventually } from '../testUtils/testEngine';
import { FfmpegCompressor } from './compressionWorker';

const MISSING_FFMPEG = '/nonexistent/ffmpeg-test';

// Stands in for ffmpeg: hangs on the "hang" session, otherwise writes an empty output file
const FAKE_FFMPEG = [
  '#!/bin/sh',
  '[ "$1" = "-version" ] && exit 0',
  'case "$2" in */hang.combined.webm) exec sleep 30;; esac',
  'for last; do :; done',
  ': > "$last"',
  '',
].join('\n');

describe('FfmpegCompressor', () => {
  let dir: string;
  let outputDir: string;

  beforeEach(() => {
    dir = makeTempDir('compression');
    outputDir = path.join(dir, 'videos');
  });

  afterEach(() => {
    removeDir(dir);
  });

  function writeChunks(sessionId: string, contents: string[]): string[] {
    const sessionDir = path.join(dir, sessionId);
    fs.mkdirSync(sessionDir, { recursive: true });
    return contents.map((content, index) => {
      const chunkPath = path.join(sessionDir, `chunk-${index}.webm`);
      fs.writeFileSync(chunkPath, content);
      return chunkPath;
    });
  }

  it('creates the output directory', () => {
    new FfmpegCompressor({ outputDir, ffmpegPath: MISSING_FFMPEG });

    expect(fs.existsSync(outputDir)).toBe(true);
  });

  it('concatenates chunks into a WebM file when ffmpeg is missing', async () => {
    const compressor = new FfmpegCompressor({ outputDir, ffmpegPath: MISSING_FFMPEG });
    const chunks = writeChunks('s-1', ['header', '-body', '-tail']);

    const location = await compressor.compress('s-1', chunks);

    expect(location).toBe(path.join(outputDir, 's-1.webm'));
    expect(fs.readFileSync(location, 'utf-8')).toBe('header-body-tail');
    expect(fs.existsSync(path.join(outputDir, 's-1.combined.webm'))).toBe(false);
    await expect(compressor.checkFfmpeg()).resolves.toBe(false);
  });

  it('rejects a recording without chunks', async () => {
    const compressor = new FfmpegCompressor({ outputDir, ffmpegPath: MISSING_FFMPEG });

    const error = await compressor.compress('s-1', []).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RecordingError);
    expect(error).toMatchObject({ code: ErrorCode.EmptyRecording });
  });

  it('runs queued jobs one after another', async () => {
    const compressor = new FfmpegCompressor({ outputDir, ffmpegPath: MISSING_FFMPEG });
    const first = writeChunks('s-1', ['a', 'b']);
    const second = writeChunks('s-2', ['c']);

    const locations = await Promise.all([
      compressor.compress('s-1', first),
      compressor.compress('s-2', []),
      compressor.compress('s-2', second),
    ].map(job => job.catch((error: Error) => error.message)));

    expect(locations).toEqual([
      path.join(outputDir, 's-1.webm'),
      'No recorded chunks to compress',
      path.join(outputDir, 's-2.webm'),
    ]);
    expect(compressor.getQueueLength()).toBe(0);
  });

  it('drops a queued job when its signal aborts', async () => {
    const compressor = new FfmpegCompressor({ outputDir, ffmpegPath: MISSING_FFMPEG });
    const controller = new AbortController();

    const first = compressor.compress('s-1', writeChunks('s-1', ['a']));
    const queued = compressor.compress('s-2', writeChunks('s-2', ['b']), controller.signal);
    controller.abort();

    await expect(queued).rejects.toThrow('Compression aborted for session s-2');
    await expect(first).resolves.toBe(path.join(outputDir, 's-1.webm'));
    expect(fs.existsSync(path.join(outputDir, 's-2.webm'))).toBe(false);
  });

  it('rejects at once when the signal has already aborted', async () => {
    const compressor = new FfmpegCompressor({ outputDir, ffmpegPath: MISSING_FFMPEG });
    const controller = new AbortController();
    controller.abort();

    await expect(compressor.compress('s-1', writeChunks('s-1', ['a']), controller.signal))
      .rejects.toThrow('Compression aborted for session s-1');
    expect(compressor.getQueueLength()).toBe(0);
  });

  it('stops a running ffmpeg on abort and frees the queue', async () => {
    const ffmpegPath = path.join(dir, 'fake-ffmpeg.sh');
    fs.writeFileSync(ffmpegPath, FAKE_FFMPEG, { mode: 0o755 });
    const compressor = new FfmpegCompressor({ outputDir, ffmpegPath });
    await expect(compressor.checkFfmpeg()).resolves.toBe(true);
    const controller = new AbortController();

    const hung = compressor.compress('hang', writeChunks('hang', ['a']), controller.signal);
    const next = compressor.compress('s-2', writeChunks('s-2', ['b']));
    await eventually(() => fs.existsSync(path.join(outputDir, 'hang.combined.webm')));
    await new Promise(resolve => setTimeout(resolve, 50));
    controller.abort();

    await expect(hung).rejects.toThrow('Compression aborted for session hang');
    await expect(next).resolves.toBe(path.join(outputDir, 's-2.mp4'));
    expect(fs.existsSync(path.join(outputDir, 'hang.combined.webm'))).toBe(false);
  });
});
