import type { Readable } from 'stream';
import type { FormatInfo } from '@vidgate/types';
import { z } from 'zod';
//------------------------------------------------------------------------------//

// yt-dlp `--dump-single-json` 출력 중 사용하는 필드만 정의 (나머지 필드는 유지)
export const RawFormatSchema = z.looseObject({
  format_id: z.string().nullish(),
  ext: z.string().nullish(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  height: z.number().nullish(),
  fps: z.number().nullish(),
  filesize: z.number().nullish(),
  tbr: z.number().nullish(),
});
export type RawFormat = z.infer<typeof RawFormatSchema>;

export const RawSubtitleTrackSchema = z.looseObject({
  ext: z.string().nullish(),
  name: z.string().nullish(),
});

export const RawVideoInfoSchema = z.looseObject({
  title: z.string().nullish(),
  thumbnail: z.string().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
  uploader_url: z.string().nullish(),
  channel_url: z.string().nullish(),
  duration: z.number().nullish(),
  view_count: z.number().nullish(),
  upload_date: z.string().nullish(),
  description: z.string().nullish(),
  formats: z.array(RawFormatSchema).nullish(),
  subtitles: z.record(z.string(), z.array(RawSubtitleTrackSchema)).nullish(),
  automatic_captions: z.record(z.string(), z.array(RawSubtitleTrackSchema)).nullish(),
});
export type RawVideoInfo = z.infer<typeof RawVideoInfoSchema>;

export type SubtitleExt = 'srt' | 'vtt';

// 내려받은 자막 파일 (임시 파일은 반환 전에 삭제됨)
export interface SubtitleFile {
  ext: SubtitleExt;
  content: Buffer;
}

/**
 * 외부 미디어 추출기 (yt-dlp 등)
 */
export interface MediaSource {
  /** 영상 메타데이터 추출 */
  extractInfo(url: string, signal?: AbortSignal): Promise<RawVideoInfo>;
  /** 선택한 포맷의 미디어 스트림 열기 (오디오 없는 영상 포맷은 오디오를 합침) */
  openDownload(url: string, format: FormatInfo): Readable;
  /**
   * 자막 파일 다운로드 (수동 자막 우선, 없으면 자동 생성 자막)
   * @throws 해당 언어 자막이 없으면 statusCode 404 에러
   */
  downloadSubtitle(url: string, lang: string, signal?: AbortSignal): Promise<SubtitleFile>;
  /** 추출기 버전 (사용 불가 시 null) */
  getVersion(): Promise<string | null>;
}
