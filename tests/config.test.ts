import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_SETTINGS, loadConfig, loadSettings, parseSettings } from '../src/utils/config';

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('uses defaults when nothing is set', () => {
    process.env = { NODE_ENV: 'test' };

    const config = loadConfig();

    expect(config.engine.ytDlpPath).toBe('yt-dlp');
    expect(config.engine.retries).toBe(3);
    expect(config.engine.concurrentFragments).toBe(5);
    expect(config.ffmpegPath).toBe('ffmpeg');
    expect(config.ledgerFile).toBe('./downloaded_files.json');
    expect(config.coolOffEvery).toBe(10);
    expect(config.coolOffMaxMs).toBe(2000);
    expect(config.thumbnailTimeout).toBe(10000);
    expect(config.cookiesFile).toBeUndefined();
    expect(config.watchUrlTemplate).toBe('https://www.youtube.com/watch?v={id}');
  });

  it('reads values from the environment and ignores invalid numbers', () => {
    process.env.YTDLP_PATH = '/opt/bin/yt-dlp';
    process.env.COOL_OFF_EVERY = '25';
    process.env.COOL_OFF_MAX_MS = 'soon';
    process.env.ENGINE_RETRIES = '-1';
    process.env.COOKIES_FILE = '/tmp/cookies.txt';

    const config = loadConfig();

    expect(config.engine.ytDlpPath).toBe('/opt/bin/yt-dlp');
    expect(config.coolOffEvery).toBe(25);
    expect(config.coolOffMaxMs).toBe(2000);
    expect(config.engine.retries).toBe(3);
    expect(config.cookiesFile).toBe('/tmp/cookies.txt');
  });
});

describe('settings', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bmd-settings-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fills in defaults for missing keys', () => {
    const settings = parseSettings({ outputFormat: 'mp3', embed: { tags: false } });

    expect(settings.outputFormat).toBe('mp3');
    expect(settings.quality).toBe('best');
    expect(settings.embed).toEqual({
      title: true,
      uploader: true,
      description: true,
      tags: false,
      license: true,
    });
    expect(settings.useYearSubfolders).toBe(false);
  });

  it('returns defaults for a missing file', () => {
    expect(loadSettings(path.join(dir, 'missing.json'))).toEqual(DEFAULT_SETTINGS);
  });

  it('returns defaults for invalid JSON or an invalid schema', () => {
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{ outputFormat: ');
    expect(loadSettings(broken)).toEqual(DEFAULT_SETTINGS);

    const invalid = path.join(dir, 'invalid.json');
    fs.writeFileSync(invalid, JSON.stringify({ outputFormat: 'avi' }));
    expect(loadSettings(invalid)).toEqual(DEFAULT_SETTINGS);
  });

  it('loads a valid file', () => {
    const file = path.join(dir, 'settings.json');
    fs.writeFileSync(file, JSON.stringify({ outputFormat: 'mkv', useYearSubfolders: true }));

    const settings = loadSettings(file);

    expect(settings.outputFormat).toBe('mkv');
    expect(settings.useYearSubfolders).toBe(true);
  });
});
