import { describe, expect, it } from 'vitest';
import {
  countFormats,
  filterFormats,
  getSubtitlesInfo,
  toVideoInfo,
  truncateDescription,
} from '../services/videoInfo.js';
import { toContentDisposition, toSafeFilename } from '../services/fetch.js';
import type { RawFormat } from '../services/types.js';

const FORMATS: RawFormat[] = [
  { format_id: '18', ext: 'mp4', vcodec: 'avc1.42001E', acodec: 'mp4a.40.2', height: 360, fps: 30, tbr: 500, filesize: 1000 },
  { format_id: '137', ext: 'mp4', vcodec: 'avc1.640028', acodec: 'none', height: 1080, fps: 30, tbr: 4000, filesize: 50000 },
  { format_id: '299', ext: 'mp4', vcodec: 'avc1.64002a', acodec: 'none', height: 1080, fps: 60, tbr: 6000 },
  { format_id: '136', ext: 'mp4', vcodec: 'avc1.4d401f', acodec: 'none', height: 720, fps: 30, tbr: 2000 },
  { format_id: '22', ext: 'mp4', vcodec: 'avc1.64001F', acodec: 'mp4a.40.2', height: 720, fps: 30, tbr: 2500 },
  { format_id: '248', ext: 'webm', vcodec: 'vp9', acodec: 'none', height: 1080, fps: 30, tbr: 3000 },
  { format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a.40.2', filesize: 3000 },
  { format_id: '251', ext: 'webm', vcodec: 'none', acodec: 'opus' },
  { format_id: 'sb0', ext: 'mhtml', vcodec: 'none', acodec: 'none' },
  { ext: 'mp4', vcodec: 'avc1', height: 480 },
];

describe('filterFormats', () => {
  it('groups formats and keeps the highest bitrate per quality', () => {
    const groups = filterFormats(FORMATS);

    expect(groups.mp4).toEqual([
      { quality: '1080p', ext: 'mp4', formatId: '137', filesize: 50000, hasAudio: false },
      { quality: '1080p60', ext: 'mp4', formatId: '299', filesize: null, hasAudio: false },
      { quality: '720p', ext: 'mp4', formatId: '22', filesize: null, hasAudio: true },
      { quality: '360p', ext: 'mp4', formatId: '18', filesize: 1000, hasAudio: true },
    ]);
    expect(groups.webm).toEqual([{ quality: '1080p', ext: 'webm', formatId: '248', filesize: null, hasAudio: false }]);
    expect(groups.audio).toEqual([
      { quality: 'Audio Only', ext: 'm4a', formatId: '140', filesize: 3000, hasAudio: true },
      { quality: 'Audio Only', ext: 'webm', formatId: '251', filesize: null, hasAudio: true },
    ]);
  });

  it('drops groups with no formats', () => {
    const groups = filterFormats([{ format_id: '18', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a', height: 360 }]);

    expect(Object.keys(groups)).toEqual(['mp4']);
  });

  it('labels only frame rates above 30 and truncates fractional ones', () => {
    const groups = filterFormats([
      { format_id: 'a', ext: 'mp4', vcodec: 'avc1', height: 1440, fps: 59.94 },
      { format_id: 'b', ext: 'mp4', vcodec: 'avc1', height: 480, fps: 29.97 },
    ]);

    expect(groups.mp4?.map(f => f.quality)).toEqual(['1440p59', '480p']);
  });

  it('keeps the first format when bitrates tie', () => {
    const groups = filterFormats([
      { format_id: 'first', ext: 'webm', vcodec: 'vp9', height: 720, tbr: 1000 },
      { format_id: 'second', ext: 'webm', vcodec: 'vp9', height: 720, tbr: 1000 },
    ]);

    expect(groups.webm?.map(f => f.formatId)).toEqual(['first']);
  });

  it('falls back to any audio-only format when no known itag is present', () => {
    const groups = filterFormats([
      { format_id: '18', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a', height: 360 },
      { format_id: '600', ext: 'WEBM', vcodec: 'none', acodec: 'opus', filesize: 1234.6 },
    ]);

    expect(groups.audio).toEqual([
      { quality: 'Audio Only', ext: 'webm', formatId: '600', filesize: 1235, hasAudio: true },
    ]);
  });

  it('returns no groups for an empty list', () => {
    expect(filterFormats([])).toEqual({});
  });
});

describe('getSubtitlesInfo', () => {
  it('lists priority languages first and names unnamed tracks by code', () => {
    const subtitles = getSubtitlesInfo({
      xx: [{ name: 'Custom' }],
      ja: [{}],
      en: [{ name: 'English' }],
      zz: [],
    });

    expect(subtitles).toEqual([
      { lang: 'en', langName: 'English' },
      { lang: 'ja', langName: 'JA' },
      { lang: 'xx', langName: 'Custom' },
    ]);
  });

  it('returns at most five languages', () => {
    const subtitles = getSubtitlesInfo({
      nl: [{ name: 'Dutch' }],
      it: [{ name: 'Italian' }],
      ru: [{ name: 'Russian' }],
      pt: [{ name: 'Portuguese' }],
      ko: [{ name: 'Korean' }],
      ja: [{ name: 'Japanese' }],
      de: [{ name: 'German' }],
    });

    expect(subtitles.map(s => s.lang)).toEqual(['de', 'ja', 'ko', 'pt', 'ru']);
  });
});

describe('truncateDescription', () => {
  it('cuts long descriptions to 200 characters including the ellipsis', () => {
    const result = truncateDescription('a'.repeat(250));

    expect(result).toBe(`${'a'.repeat(197)}...`);
    expect(result).toHaveLength(200);
  });

  it('keeps descriptions up to 200 characters', () => {
    const text = 'b'.repeat(200);

    expect(truncateDescription(text)).toBe(text);
    expect(truncateDescription(undefined)).toBeNull();
  });
});

describe('toVideoInfo', () => {
  it('shapes extractor output with defaults', () => {
    const video = toVideoInfo({
      channel: 'Fallback Channel',
      channel_url: 'https://example.com/channel',
      view_count: 42,
      formats: FORMATS,
      subtitles: { en: [{ name: 'English' }], xx: [{ name: 'Custom' }] },
      automatic_captions: { fr: [{ name: 'French' }], ja: [{ ext: 'vtt' }] },
    });

    expect(video.title).toBe('Unknown Title');
    expect(video.thumbnail).toBe('');
    expect(video.channel).toBe('Fallback Channel');
    expect(video.channelUrl).toBe('https://example.com/channel');
    expect(video.viewCount).toBe(42);
    expect(video.duration).toBeNull();
    expect(video.uploadDate).toBeNull();
    expect(video.description).toBeNull();
    expect(video.subtitles).toEqual([
      { lang: 'en', langName: 'English' },
      { lang: 'fr', langName: 'French' },
      { lang: 'ja', langName: 'JA' },
      { lang: 'xx', langName: 'Custom' },
    ]);
    expect(countFormats(video)).toBe(7);
  });

  it('prefers uploader fields over channel fields', () => {
    const video = toVideoInfo({
      title: 'Clip',
      uploader: 'Uploader',
      channel: 'Channel',
      uploader_url: 'https://example.com/uploader',
      channel_url: 'https://example.com/channel',
    });

    expect(video.channel).toBe('Uploader');
    expect(video.channelUrl).toBe('https://example.com/uploader');
    expect(video.formats).toEqual({});
    expect(countFormats(video)).toBe(0);
  });
});

describe('download filenames', () => {
  it('keeps letters, digits, spaces, hyphens and underscores', () => {
    expect(toSafeFilename('Mein Lied: Ü/ber?', 'mp4')).toBe('Mein Lied Über.mp4');
    expect(toSafeFilename('my_clip - part 2!', 'webm')).toBe('my_clip - part 2.webm');
  });

  it('limits the title to 50 characters', () => {
    expect(toSafeFilename('x'.repeat(60), 'm4a')).toBe(`${'x'.repeat(50)}.m4a`);
  });

  it('falls back to a generic name', () => {
    expect(toSafeFilename('?!*', 'mp4')).toBe('video.mp4');
  });

  it('adds an encoded filename for non-ASCII titles', () => {
    expect(toContentDisposition('Mein Lied Über.mp4')).toBe(
      `attachment; filename="Mein Lied _ber.mp4"; filename*=UTF-8''Mein%20Lied%20%C3%9Cber.mp4`
    );
  });

  it('keeps quotes and backslashes out of the quoted filename', () => {
    expect(toContentDisposition('a"b\\c.mp4')).toBe(`attachment; filename="a_b_c.mp4"; filename*=UTF-8''a%22b%5Cc.mp4`);
  });
});
