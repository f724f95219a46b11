import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  setFfmpegPath: vi.fn(),
  installer: { path: '' },
}));

vi.mock('fluent-ffmpeg', () => ({ default: { setFfmpegPath: mocks.setFfmpegPath } }));
vi.mock('@ffmpeg-installer/ffmpeg', () => ({ default: mocks.installer }));

import { configureFfmpegPath } from '../src/utils/media/configureFfmpeg.js';
import { makeTempDir, removeDir } from './helpers/media.js';

describe('configureFfmpegPath', () => {
  let dir: string;
  let binary: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    mocks.installer.path = '';
    dir = await makeTempDir();
    binary = path.join(dir, 'ffmpeg');
    fs.writeFileSync(binary, '');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('prefers an explicit path that exists', () => {
    mocks.installer.path = path.join(dir, 'installer-ffmpeg');
    fs.writeFileSync(mocks.installer.path, '');

    expect(configureFfmpegPath({ ffmpegPath: ` ${binary} ` })).toBe(binary);
    expect(mocks.setFfmpegPath).toHaveBeenCalledWith(binary);
  });

  it('falls back to the installer binary', () => {
    mocks.installer.path = binary;
    expect(configureFfmpegPath()).toBe(binary);
    expect(mocks.setFfmpegPath).toHaveBeenCalledTimes(1);
  });

  it('leaves PATH resolution alone when no binary exists', () => {
    expect(configureFfmpegPath({ ffmpegPath: path.join(dir, 'missing') })).toBeNull();
    expect(configureFfmpegPath()).toBeNull();
    expect(mocks.setFfmpegPath).not.toHaveBeenCalled();
  });
});
