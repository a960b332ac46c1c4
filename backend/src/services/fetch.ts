import type { VideoInfo } from '@vidgate/types';
import type { AppContext } from '../context.js';
import { countFormats, toVideoInfo } from './videoInfo.js';
import { logger } from '../utils/index.js';
//------------------------------------------------------------------------------//

export interface FetchVideoResult {
  video: VideoInfo;
  cached: boolean;
}

/**
 * 영상 정보 조회 (캐시 우선)
 *
 * 캐시에 없으면 추출기를 호출하고 결과를 캐시에 저장합니다.
 * 추출은 잠금 밖에서 실행되므로 같은 URL의 동시 미스는 각각 추출할 수 있습니다.
 * @throws 사용 가능한 포맷이 없으면 statusCode 404 에러
 */
export async function fetchVideoInfo(
  context: Pick<AppContext, 'cache' | 'source'>,
  url: string,
  signal?: AbortSignal
): Promise<FetchVideoResult> {
  const cachedVideo = await context.cache.get(url);
  if (cachedVideo) {
    return { video: cachedVideo, cached: true };
  }

  const raw = await context.source.extractInfo(url, signal);
  const video = toVideoInfo(raw);
  const totalFormats = countFormats(video);

  if (totalFormats === 0) {
    logger.warn('api', `No suitable formats found: ${url}`);
    throw Object.assign(new Error('No suitable formats found for this video'), { statusCode: 404 });
  }

  logger.info('api', `Found ${totalFormats} formats and ${video.subtitles.length} subtitle languages`, { url });
  await context.cache.set(url, video);

  return { video, cached: false };
}

/**
 * 다운로드 파일명 (영숫자/공백/-/_ 만 허용, 최대 50자)
 */
export function toSafeFilename(title: string, ext: string): string {
  const safeTitle = Array.from(title)
    .filter(c => /[\p{L}\p{N} _-]/u.test(c))
    .join('')
    .trimEnd()
    .slice(0, 50);
  return `${safeTitle || 'video'}.${ext}`;
}

/**
 * Content-Disposition 헤더 값 (비 ASCII 파일명은 RFC 5987 형식 병기)
 * quoted-string 안에서 의미가 있는 `"` 와 `\` 도 대체합니다.
 */
export function toContentDisposition(filename: string): string {
  const asciiFallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${asciiFallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}
