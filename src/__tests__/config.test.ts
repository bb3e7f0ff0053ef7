/**
 * Tests for configuration loading.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_VIDEO_EXTENSIONS,
  loadConfig,
  parseConfig,
  resolvePath,
} from '../index.js';
import { makeTempDir, removeTempDir } from './helpers.js';

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const config = parseConfig({}, '/base');

    expect(config).toEqual({
      mediaDirectories: [],
      stagingDirectory: '/tmp/transcoding',
      presetFile: '/base/AV1_MKV_Stereo.json',
      presetName: 'AV1_MKV_Stereo',
      inspectedLogPath: '/base/inspected_files.log',
      maxSizeGB: 0.005,
      targetCodec: 'av1',
      videoExtensions: DEFAULT_VIDEO_EXTENSIONS,
      replaceStrategy: 'auto',
      activityLogPath: '/base/activity.log',
      logLevel: 'info',
      logFormat: 'pretty',
      tools: { ffprobe: 'ffprobe', handbrake: 'HandBrakeCLI', rsync: 'rsync' },
    });
  });

  it('should resolve relative paths against the base directory', () => {
    const config = parseConfig(
      { mediaDirectories: ['media/tv', '/srv/films'], stagingDirectory: '../staging' },
      '/base/conf'
    );

    expect(config.mediaDirectories).toEqual(['/base/conf/media/tv', '/srv/films']);
    expect(config.stagingDirectory).toBe('/base/staging');
  });

  it('should lowercase extensions', () => {
    const config = parseConfig({ videoExtensions: ['.MKV', '.Mp4'] }, '/base');
    expect(config.videoExtensions).toEqual(['.mkv', '.mp4']);
  });

  it('should keep a disabled activity log', () => {
    expect(parseConfig({ activityLogPath: null }, '/base').activityLogPath).toBeNull();
  });

  it('should reject a non-positive size limit', () => {
    expect(() => parseConfig({ maxSizeGB: 0 }, '/base')).toThrow(ConfigurationError);
    expect(() => parseConfig({ maxSizeGB: 0 }, '/base')).toThrow(/^Invalid configuration: maxSizeGB: /);
  });

  it('should reject malformed extensions', () => {
    expect(() => parseConfig({ videoExtensions: ['mkv'] }, '/base')).toThrow(
      'Invalid configuration: videoExtensions.0: extension must look like ".mkv"'
    );
  });

  it('should reject unknown replace strategies', () => {
    expect(() => parseConfig({ replaceStrategy: 'copy' }, '/base')).toThrow(ConfigurationError);
  });
});

describe('resolvePath', () => {
  it('should expand the home directory', () => {
    expect(resolvePath('/base', '~/videos')).toBe(path.join(os.homedir(), 'videos'));
    expect(resolvePath('/base', '~')).toBe(os.homedir());
  });

  it('should normalize absolute paths', () => {
    expect(resolvePath('/base', '/srv//media/../films')).toBe('/srv/films');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should use defaults when no file is present', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.mediaDirectories).toEqual([]);
    expect(config.inspectedLogPath).toBe(path.join(dir, 'inspected_files.log'));
  });

  it('should read watchdog.config.json from the working directory', async () => {
    await fs.writeFile(
      path.join(dir, 'watchdog.config.json'),
      JSON.stringify({ mediaDirectories: ['library'], maxSizeGB: 2 })
    );

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.mediaDirectories).toEqual([path.join(dir, 'library')]);
    expect(config.maxSizeGB).toBe(2);
  });

  it('should resolve paths against an explicit file directory', async () => {
    const confDir = path.join(dir, 'etc');
    await fs.mkdir(confDir);
    await fs.writeFile(
      path.join(confDir, 'custom.json'),
      JSON.stringify({ inspectedLogPath: 'state/inspected.log' })
    );

    const config = loadConfig({ cwd: dir, env: { WATCHDOG_CONFIG: 'etc/custom.json' } });

    expect(config.inspectedLogPath).toBe(path.join(confDir, 'state', 'inspected.log'));
  });

  it('should fail when an explicit file is missing', () => {
    expect(() => loadConfig({ cwd: dir, env: {}, configPath: 'missing.json' })).toThrow(
      `Configuration file not found: ${path.join(dir, 'missing.json')}`
    );
  });

  it('should fail on malformed JSON', async () => {
    await fs.writeFile(path.join(dir, 'watchdog.config.json'), '{ not json');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigurationError);
  });

  it('should fail when the file holds an array', async () => {
    await fs.writeFile(path.join(dir, 'watchdog.config.json'), '[]');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow('must contain a JSON object');
  });

  it('should let the environment override the file', async () => {
    await fs.writeFile(
      path.join(dir, 'watchdog.config.json'),
      JSON.stringify({ maxSizeGB: 2, targetCodec: 'av1' })
    );

    const config = loadConfig({
      cwd: dir,
      env: {
        WATCHDOG_MEDIA_DIRECTORIES: ['/srv/a', '/srv/b'].join(path.delimiter),
        WATCHDOG_STAGING_DIRECTORY: '/scratch',
        WATCHDOG_MAX_SIZE_GB: '1.5',
        WATCHDOG_TARGET_CODEC: 'hevc',
        WATCHDOG_LOG_LEVEL: 'debug',
      },
    });

    expect(config.mediaDirectories).toEqual(['/srv/a', '/srv/b']);
    expect(config.stagingDirectory).toBe('/scratch');
    expect(config.maxSizeGB).toBe(1.5);
    expect(config.targetCodec).toBe('hevc');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject a non-numeric size override', () => {
    expect(() => loadConfig({ cwd: dir, env: { WATCHDOG_MAX_SIZE_GB: 'large' } })).toThrow(
      ConfigurationError
    );
  });
});
