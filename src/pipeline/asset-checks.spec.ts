import { parseAllowedFormats } from '../config/pipeline.config';
import { AssetCheckOptions, checkAsset, gigabytesToBytes } from './asset-checks';
import { VideoAsset } from './interfaces/job.interface';

describe('checkAsset', () => {
  const options: AssetCheckOptions = {
    maxSizeBytes: gigabytesToBytes(1.5),
    allowedFormats: parseAllowedFormats('h264:mp4,hevc:mkv'),
  };
  const asset = (overrides: Partial<VideoAsset>): VideoAsset => ({
    sourceChatId: 1,
    sourceMessageId: 1,
    fileSize: 1024,
    duration: 60,
    ...overrides,
  });

  it('converts gigabytes with binary units', () => {
    expect(gigabytesToBytes(1.5)).toBe(1_610_612_736);
  });

  it('accepts an allowed codec and container in any case', () => {
    expect(checkAsset(asset({ codec: 'H264', container: ' MP4 ' }), options)).toBeNull();
  });

  it('rejects files above the size cap', () => {
    expect(checkAsset(asset({ fileSize: 1_610_612_737 }), options)).toBe('too-large');
    expect(checkAsset(asset({ fileSize: 1_610_612_736 }), options)).toBeNull();
  });

  it('lets an unknown size through', () => {
    expect(checkAsset(asset({ fileSize: 0 }), options)).toBeNull();
  });

  it('rejects a pair that is not on the list', () => {
    expect(checkAsset(asset({ codec: 'h264', container: 'mkv' }), options)).toBe('unsupported-format');
  });

  it('lets unknown codecs or containers through', () => {
    expect(checkAsset(asset({ codec: 'vp9' }), options)).toBeNull();
    expect(checkAsset(asset({ container: 'webm' }), options)).toBeNull();
  });

  it('skips the format check when the allow list is empty', () => {
    expect(checkAsset(asset({ codec: 'vp9', container: 'webm' }), { ...options, allowedFormats: [] })).toBeNull();
  });
});
