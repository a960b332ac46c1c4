import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createAppContext, type AppContextOptions } from '../context.js';
import { createFastifyApp, type FastifyApp } from '../app.js';
import type { MediaSource, RawVideoInfo } from '../services/types.js';

const VIDEO_URL = 'https://www.youtube.com/watch?v=dQw4w9WgXcQ';
const SHORT_URL = 'https://youtu.be/dQw4w9WgXcQ';

const RAW_VIDEO: RawVideoInfo = {
  title: 'Test Video',
  thumbnail: 'https://example.com/thumb.jpg',
  uploader: 'Test Channel',
  duration: 212,
  formats: [
    { format_id: '18', ext: 'mp4', vcodec: 'avc1', acodec: 'mp4a', height: 360, tbr: 500 },
    { format_id: '137', ext: 'mp4', vcodec: 'avc1', acodec: 'none', height: 1080, tbr: 4000 },
    { format_id: '140', ext: 'm4a', vcodec: 'none', acodec: 'mp4a', filesize: 3000 },
  ],
};

const SUBTITLE_BODY = 'WEBVTT\n\n00:00.000 --> 00:01.000\nHello\n';

const createSource = () => ({
  extractInfo: vi.fn<MediaSource['extractInfo']>().mockResolvedValue(RAW_VIDEO),
  openDownload: vi.fn<MediaSource['openDownload']>(() => Readable.from([Buffer.from('media-bytes')])),
  downloadSubtitle: vi.fn<MediaSource['downloadSubtitle']>().mockResolvedValue({
    ext: 'vtt',
    content: Buffer.from(SUBTITLE_BODY),
  }),
  getVersion: vi.fn<MediaSource['getVersion']>().mockResolvedValue('2025.01.15'),
});

describe('API', () => {
  let source: ReturnType<typeof createSource>;
  let app: FastifyApp;

  const build = async (options: Omit<AppContextOptions, 'source'> = {}) => {
    app = await createFastifyApp(createAppContext({ ...options, source }));
    return app;
  };

  beforeEach(() => {
    source = createSource();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /api/fetch', () => {
    it('serves repeat lookups of the same video from cache', async () => {
      await build();

      const first = await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });
      const second = await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: SHORT_URL } });

      expect(first.statusCode).toBe(200);
      expect(first.json()).toMatchObject({
        success: true,
        cached: false,
        video: {
          title: 'Test Video',
          channel: 'Test Channel',
          formats: {
            mp4: [
              { quality: '1080p', ext: 'mp4', formatId: '137', filesize: null, hasAudio: false },
              { quality: '360p', ext: 'mp4', formatId: '18', filesize: null, hasAudio: true },
            ],
            audio: [{ quality: 'Audio Only', ext: 'm4a', formatId: '140', filesize: 3000, hasAudio: true }],
          },
        },
        session: { showDelay: true, rateLimit: { limited: false, remaining: 10 } },
      });
      expect(second.json()).toMatchObject({ cached: true, video: { title: 'Test Video' } });
      expect(source.extractInfo).toHaveBeenCalledTimes(1);
    });

    it('hands the extractor a signal tied to the client connection', async () => {
      await build();

      await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });

      const signal = source.extractInfo.mock.calls[0][1];
      expect(signal).toBeInstanceOf(AbortSignal);
      expect(signal?.aborted).toBe(false);
    });

    it('rejects a malformed url', async () => {
      await build();

      const response = await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: 'not a url' } });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'Invalid request', issues: [{ path: 'url' }] });
      expect(source.extractInfo).not.toHaveBeenCalled();
    });

    it('passes extraction failures through as client errors', async () => {
      source.extractInfo.mockRejectedValueOnce(
        Object.assign(new Error('Failed to extract video information: unsupported site'), { statusCode: 400 })
      );
      await build();

      const response = await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Failed to extract video information: unsupported site' });
    });

    it('returns 404 when the video has no downloadable formats', async () => {
      source.extractInfo.mockResolvedValueOnce({ title: 'Storyboard Only', formats: [] });
      await build();

      const response = await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'No suitable formats found for this video' });
    });
  });

  describe('POST /api/download', () => {
    it('streams the selected format as an attachment', async () => {
      await build();

      const response = await app.inject({
        method: 'POST',
        url: '/api/download',
        payload: { url: VIDEO_URL, formatId: '18' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('media-bytes');
      expect(response.headers['content-type']).toBe('video/mp4');
      expect(response.headers['content-disposition']).toBe(
        `attachment; filename="Test Video.mp4"; filename*=UTF-8''Test%20Video.mp4`
      );
      expect(response.headers['cache-control']).toBe('no-store');
      expect(source.openDownload).toHaveBeenCalledWith(VIDEO_URL, {
        quality: '360p',
        ext: 'mp4',
        formatId: '18',
        filesize: null,
        hasAudio: true,
      });
    });

    it('marks video-only formats for an audio merge', async () => {
      await build();

      const response = await app.inject({
        method: 'POST',
        url: '/api/download',
        payload: { url: VIDEO_URL, formatId: '137' },
      });

      expect(response.statusCode).toBe(200);
      expect(source.openDownload).toHaveBeenCalledWith(VIDEO_URL, expect.objectContaining({ formatId: '137', hasAudio: false }));
    });

    it('names and labels the file after the selected format', async () => {
      await build();

      const response = await app.inject({
        method: 'POST',
        url: '/api/download',
        payload: { url: VIDEO_URL, formatId: '140', ext: 'mp3' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('audio/mp4');
      expect(response.headers['content-disposition']).toBe(
        `attachment; filename="Test Video.m4a"; filename*=UTF-8''Test%20Video.m4a`
      );
    });

    it('refuses downloads past the daily quota', async () => {
      await build({ sessions: { dailyQuota: 1 } });
      const payload = { url: VIDEO_URL, formatId: '140' };

      const first = await app.inject({ method: 'POST', url: '/api/download', payload });
      const second = await app.inject({ method: 'POST', url: '/api/download', payload });

      expect(first.statusCode).toBe(200);
      expect(first.headers['content-type']).toBe('audio/mp4');
      expect(second.statusCode).toBe(429);
      expect(second.json()).toMatchObject({ error: 'Rate limited', rateLimit: { limited: true, remaining: 0 } });
      expect(source.openDownload).toHaveBeenCalledTimes(1);
    });

    it('rejects a format the video does not offer', async () => {
      await build();

      const response = await app.inject({
        method: 'POST',
        url: '/api/download',
        payload: { url: VIDEO_URL, formatId: '999' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ error: 'Format 999 is not available for this video' });
      expect(source.openDownload).not.toHaveBeenCalled();
    });
  });

  describe('POST /api/download-subtitle', () => {
    it('sends the subtitle file and counts it as a download', async () => {
      await build();

      const response = await app.inject({
        method: 'POST',
        url: '/api/download-subtitle',
        payload: { url: VIDEO_URL, lang: 'en' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe(SUBTITLE_BODY);
      expect(response.headers['content-type']).toBe('text/vtt; charset=utf-8');
      expect(response.headers['content-disposition']).toBe(
        `attachment; filename="Test Video.en.vtt"; filename*=UTF-8''Test%20Video.en.vtt`
      );
      expect(source.downloadSubtitle).toHaveBeenCalledWith(VIDEO_URL, 'en', expect.any(AbortSignal));

      const session = await app.inject({ method: 'GET', url: '/api/session' });
      expect(session.json()).toMatchObject({ session: { downloadCount: 1, dailyDownloads: 1 } });
    });

    it('returns 404 for a missing language without counting it', async () => {
      source.downloadSubtitle.mockRejectedValueOnce(
        Object.assign(new Error('Subtitle not found for language: xx'), { statusCode: 404 })
      );
      await build();

      const response = await app.inject({
        method: 'POST',
        url: '/api/download-subtitle',
        payload: { url: VIDEO_URL, lang: 'xx' },
      });
      const session = await app.inject({ method: 'GET', url: '/api/session' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Subtitle not found for language: xx' });
      expect(session.json()).toMatchObject({ session: { downloadCount: 0 } });
    });

    it('shares the daily quota with media downloads', async () => {
      await build({ sessions: { dailyQuota: 1 } });
      await app.inject({ method: 'POST', url: '/api/download', payload: { url: VIDEO_URL, formatId: '18' } });

      const response = await app.inject({
        method: 'POST',
        url: '/api/download-subtitle',
        payload: { url: VIDEO_URL, lang: 'en' },
      });

      expect(response.statusCode).toBe(429);
      expect(response.json()).toMatchObject({ error: 'Rate limited', rateLimit: { limited: true, remaining: 0 } });
      expect(source.downloadSubtitle).not.toHaveBeenCalled();
    });

    it('rejects a malformed language code', async () => {
      await build();

      const response = await app.inject({
        method: 'POST',
        url: '/api/download-subtitle',
        payload: { url: VIDEO_URL, lang: 'en us' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'Invalid request', issues: [{ path: 'lang' }] });
    });
  });

  describe('session routes', () => {
    it('reports the caller session', async () => {
      await build();
      await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });

      const response = await app.inject({ method: 'GET', url: '/api/session' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        success: true,
        session: { fetchCount: 1, downloadCount: 0, adViews: 0, isPremium: false, bypassUntil: null, showDelay: true },
      });
    });

    it('lifts the delay on the third ad view', async () => {
      await build();

      await app.inject({ method: 'POST', url: '/api/session/ad-view' });
      const second = await app.inject({ method: 'POST', url: '/api/session/ad-view' });
      const third = await app.inject({ method: 'POST', url: '/api/session/ad-view' });

      expect(second.json()).toEqual({ success: true, adViews: 2, showDelay: true, bypassUntil: null });
      expect(third.json()).toMatchObject({ success: true, adViews: 3, showDelay: false });
      expect(typeof third.json().bypassUntil).toBe('string');
    });
  });

  describe('cache routes', () => {
    it('reports statistics and invalidates entries', async () => {
      await build();
      await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });
      await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });

      const stats = await app.inject({ method: 'GET', url: '/api/cache/stats' });
      expect(stats.json()).toEqual({
        success: true,
        cache: { size: 1, maxSize: 100, hitCount: 1, missCount: 1, hitRate: 50, totalRequests: 2 },
        sessions: { totalSessions: 1, premiumSessions: 0, bypassedSessions: 0 },
      });

      const removed = await app.inject({ method: 'POST', url: '/api/cache/invalidate', payload: { url: SHORT_URL } });
      const again = await app.inject({ method: 'POST', url: '/api/cache/invalidate', payload: { url: SHORT_URL } });

      expect(removed.json()).toEqual({ success: true, removed: true });
      expect(again.json()).toEqual({ success: true, removed: false });
    });

    it('clears the cache', async () => {
      await build();
      await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });

      const response = await app.inject({ method: 'DELETE', url: '/api/cache' });
      const refetch = await app.inject({ method: 'POST', url: '/api/fetch', payload: { url: VIDEO_URL } });

      expect(response.json()).toEqual({ success: true, message: 'Cache cleared' });
      expect(refetch.json()).toMatchObject({ cached: false });
      expect(source.extractInfo).toHaveBeenCalledTimes(2);
    });
  });

  describe('GET /api/health', () => {
    it('is healthy when the extractor responds', async () => {
      await build();

      const response = await app.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', ytDlp: { available: true, version: '2025.01.15' } });
    });

    it('is unhealthy without the extractor', async () => {
      source.getVersion.mockResolvedValueOnce(null);
      await build();

      const response = await app.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'unhealthy', ytDlp: { available: false, version: null } });
    });
  });

  it('answers unknown routes with 404', async () => {
    await build();

    const response = await app.inject({ method: 'GET', url: '/api/unknown' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Not Found', message: 'Route GET:/api/unknown not found' });
  });
});
