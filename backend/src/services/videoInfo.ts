import type { FormatGroup, FormatInfo, SubtitleInfo, VideoInfo } from '@vidgate/types';
import type { RawFormat, RawVideoInfo } from './types.js';
//------------------------------------------------------------------------------//

// YouTube 오디오 전용 포맷 itag
const AUDIO_FORMAT_IDS = new Set(['139', '140', '141', '171', '172', '249', '250', '251']);

// 우선 노출할 자막 언어
const PRIORITY_SUBTITLE_LANGS = ['en', 'es', 'fr', 'de', 'ja', 'ko', 'pt', 'ru', 'it', 'nl'];

const MAX_COLLECTED_SUBTITLES = 10;
const MAX_RETURNED_SUBTITLES = 5;
const MAX_DESCRIPTION_LENGTH = 200;

interface RankedFormat {
  info: FormatInfo;
  tbr: number;
}

const toFilesize = (value: number | null | undefined): number | null => (typeof value === 'number' ? Math.round(value) : null);

const hasAudioTrack = (format: RawFormat): boolean => (format.acodec ?? 'none') !== 'none';

const isAudioOnly = (format: RawFormat): boolean => (format.vcodec ?? 'none') === 'none' && hasAudioTrack(format);

/**
 * 품질 문자열의 해상도 (예: "1080p60" → 1080)
 */
function resolutionOf(quality: string): number {
  const match = quality.match(/^(\d+)p/);
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * 포맷 목록을 확장자별로 그룹화
 *
 * - 영상: mp4/webm별로 품질마다 비트레이트(tbr)가 가장 높은 포맷 하나만 유지, 해상도 내림차순
 *   (영상 전용 포맷은 hasAudio: false, 다운로드 시 오디오를 합침)
 * - 오디오: 알려진 오디오 전용 itag만 포함, 없으면 itag 140 또는 첫 오디오 전용 포맷으로 대체
 * - 빈 그룹은 제외
 */
export function filterFormats(formats: RawFormat[]): Partial<Record<FormatGroup, FormatInfo[]>> {
  const video: Record<'mp4' | 'webm', Map<string, RankedFormat>> = { mp4: new Map(), webm: new Map() };
  const audio: FormatInfo[] = [];

  for (const format of formats) {
    if (!format.format_id || !format.ext) {
      continue;
    }

    const ext = format.ext.toLowerCase();
    const vcodec = format.vcodec ?? 'none';

    if (isAudioOnly(format)) {
      if (AUDIO_FORMAT_IDS.has(format.format_id)) {
        audio.push({
          quality: 'Audio Only',
          ext,
          formatId: format.format_id,
          filesize: toFilesize(format.filesize),
          hasAudio: true,
        });
      }
      continue;
    }

    const group = ext === 'mp4' ? 'mp4' : ext === 'webm' ? 'webm' : null;
    if (vcodec === 'none' || !format.height || !group) {
      continue;
    }

    // 30fps 초과만 표기 (60.0과 60 중복 방지를 위해 정수화)
    const fps = format.fps ?? 0;
    const quality = fps > 30 ? `${format.height}p${Math.trunc(fps)}` : `${format.height}p`;
    const tbr = format.tbr ?? 0;
    const current = video[group].get(quality);

    if (!current || tbr > current.tbr) {
      video[group].set(quality, {
        info: {
          quality,
          ext: group,
          formatId: format.format_id,
          filesize: toFilesize(format.filesize),
          hasAudio: hasAudioTrack(format),
        },
        tbr,
      });
    }
  }

  const result: Partial<Record<FormatGroup, FormatInfo[]>> = {};

  for (const ext of ['mp4', 'webm'] as const) {
    const list = Array.from(video[ext].values(), ranked => ranked.info);
    if (list.length > 0) {
      result[ext] = list.sort((a, b) => resolutionOf(b.quality) - resolutionOf(a.quality));
    }
  }

  if (audio.length > 0) {
    result.audio = audio;
  } else {
    // 최소 하나의 오디오 포맷 보장
    const fallback = formats.find(f => f.format_id === '140') ?? formats.find(f => isAudioOnly(f) && Boolean(f.format_id));
    if (fallback?.format_id) {
      result.audio = [
        {
          quality: 'Audio Only',
          ext: (fallback.ext ?? 'm4a').toLowerCase(),
          formatId: fallback.format_id,
          filesize: toFilesize(fallback.filesize),
          hasAudio: true,
        },
      ];
    }
  }

  return result;
}

/**
 * 자막 언어 목록 (우선 언어 먼저, 최대 5개)
 */
export function getSubtitlesInfo(subtitles: Record<string, Array<{ name?: string | null }>>): SubtitleInfo[] {
  const list: SubtitleInfo[] = [];

  for (const lang of PRIORITY_SUBTITLE_LANGS) {
    const tracks = subtitles[lang];
    if (tracks && tracks.length > 0) {
      list.push({ lang, langName: tracks[0].name ?? lang.toUpperCase() });
    }
  }

  for (const [lang, tracks] of Object.entries(subtitles)) {
    if (list.length >= MAX_COLLECTED_SUBTITLES) {
      break;
    }
    if (!PRIORITY_SUBTITLE_LANGS.includes(lang) && tracks.length > 0) {
      list.push({ lang, langName: tracks[0].name ?? lang.toUpperCase() });
    }
  }

  return list.slice(0, MAX_RETURNED_SUBTITLES);
}

/**
 * 설명 길이 제한 (200자 초과 시 197자 + "...")
 */
export function truncateDescription(description: string | null | undefined): string | null {
  if (description === null || description === undefined) {
    return null;
  }
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    return `${description.slice(0, MAX_DESCRIPTION_LENGTH - 3)}...`;
  }
  return description;
}

/**
 * yt-dlp 원본 메타데이터를 API 응답 형태로 변환
 */
export function toVideoInfo(raw: RawVideoInfo): VideoInfo {
  return {
    title: raw.title ?? 'Unknown Title',
    thumbnail: raw.thumbnail ?? '',
    formats: filterFormats(raw.formats ?? []),
    subtitles: getSubtitlesInfo({ ...(raw.subtitles ?? {}), ...(raw.automatic_captions ?? {}) }),
    channel: raw.uploader ?? raw.channel ?? null,
    channelUrl: raw.uploader_url ?? raw.channel_url ?? null,
    duration: raw.duration ?? null,
    viewCount: typeof raw.view_count === 'number' ? Math.round(raw.view_count) : null,
    uploadDate: raw.upload_date ?? null,
    description: truncateDescription(raw.description),
  };
}

/**
 * 사용 가능한 포맷 개수
 */
export function countFormats(video: VideoInfo): number {
  return Object.values(video.formats).reduce((total, list) => total + (list?.length ?? 0), 0);
}
