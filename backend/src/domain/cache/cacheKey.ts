import { createHash } from 'crypto';
//------------------------------------------------------------------------------//

// 같은 영상을 가리키는 YouTube URL 형태들
const YOUTUBE_ID_PATTERNS: readonly RegExp[] = [
  /youtube\.com\/watch\?(?:[^#]*&)?v=([\w-]+)/,
  /youtu\.be\/([\w-]+)/,
  /youtube\.com\/embed\/([\w-]+)/,
  /youtube\.com\/v\/([\w-]+)/,
  /youtube\.com\/shorts\/([\w-]+)/,
  /youtube\.com\/live\/([\w-]+)/,
];

/**
 * YouTube 영상 ID 추출
 * @returns 인식할 수 없는 URL이면 null
 */
export function extractYoutubeId(locator: string): string | null {
  if (!locator.includes('youtube.com') && !locator.includes('youtu.be')) {
    return null;
  }

  for (const pattern of YOUTUBE_ID_PATTERNS) {
    const match = locator.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * 입력 URL을 캐시 키로 정규화
 *
 * - YouTube 영상: `yt_<영상 ID>` (형식이 달라도 같은 키)
 * - 그 외: 원문의 SHA-256 hex
 */
export function normalizeLocator(locator: string): string {
  const videoId = extractYoutubeId(locator);
  if (videoId) {
    return `yt_${videoId}`;
  }
  return createHash('sha256').update(locator).digest('hex');
}
