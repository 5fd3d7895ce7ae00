import { ChildProcess, spawn } from 'child_process';
import { PassThrough } from 'stream';
import { FfmpegRunner } from '../src/download/engine/FfmpegRunner';

jest.mock('child_process', () => ({
  ...jest.requireActual('child_process'),
  spawn: jest.fn(),
}));

class FakeProcess extends ChildProcess {
  readonly err = new PassThrough();

  constructor() {
    super();
    this.stderr = this.err;
  }

  kill(): boolean {
    return true;
  }
}

describe('FfmpegRunner', () => {
  const spawnMock = jest.mocked(spawn);
  let fake: FakeProcess;

  beforeEach(() => {
    fake = new FakeProcess();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(fake);
  });

  it('reports availability from the version probe', async () => {
    const runner = new FfmpegRunner('/usr/bin/ffmpeg');

    const available = runner.isAvailable();
    fake.emit('close', 0);

    await expect(available).resolves.toBe(true);
    expect(spawnMock.mock.calls[0]?.[0]).toBe('/usr/bin/ffmpeg');
    expect(spawnMock.mock.calls[0]?.[1]).toEqual(['-version']);
  });

  it('is unavailable when the executable cannot be started', async () => {
    const available = new FfmpegRunner().isAvailable();
    fake.emit('error', new Error('spawn ffmpeg ENOENT'));

    await expect(available).resolves.toBe(false);
  });

  it('runs quietly and surfaces stderr on failure', async () => {
    const run = new FfmpegRunner().run(['-y', '-i', 'in.webp', 'out.png']);
    fake.err.emit('data', Buffer.from('in.webp: No such file or directory\n'));
    fake.emit('close', 1);

    await expect(run).rejects.toThrow('in.webp: No such file or directory');
    expect(spawnMock.mock.calls[0]?.[1]).toEqual([
      '-hide_banner', '-loglevel', 'error', '-y', '-i', 'in.webp', 'out.png',
    ]);
  });
});
