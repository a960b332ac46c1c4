import { z } from 'zod';

// 다운로드 가능한 포맷 스키마
export const FormatInfoSchema = z.object({
  quality: z.string(),
  ext: z.string(),
  formatId: z.string(),
  filesize: z.number().int().nullable(),
  hasAudio: z.boolean(), // false면 다운로드 시 최고 음질 오디오를 합쳐서 전송
});
export type FormatInfo = z.infer<typeof FormatInfoSchema>;

// 자막 언어 스키마
export const SubtitleInfoSchema = z.object({
  lang: z.string(),
  langName: z.string(),
});
export type SubtitleInfo = z.infer<typeof SubtitleInfoSchema>;

// 포맷 그룹 (확장자별)
export const FormatGroupSchema = z.enum(['mp4', 'webm', 'audio']);
export type FormatGroup = z.infer<typeof FormatGroupSchema>;

// 영상 정보 스키마 (캐시에 저장되는 값)
export const VideoInfoSchema = z.object({
  title: z.string(),
  thumbnail: z.string(),
  formats: z.partialRecord(FormatGroupSchema, z.array(FormatInfoSchema)),
  subtitles: z.array(SubtitleInfoSchema),
  channel: z.string().nullable(),
  channelUrl: z.string().nullable(),
  duration: z.number().nullable(), // 초 단위
  viewCount: z.number().int().nullable(),
  uploadDate: z.string().nullable(), // YYYYMMDD 형식
  description: z.string().nullable(),
});
export type VideoInfo = z.infer<typeof VideoInfoSchema>;

// 영상 정보 조회 요청
export const FetchRequestSchema = z.object({
  url: z.url(),
});
export type FetchRequest = z.infer<typeof FetchRequestSchema>;

// 다운로드 요청 (파일 확장자는 선택한 포맷을 따름)
export const DownloadRequestSchema = z.object({
  url: z.url(),
  formatId: z.string().min(1).max(64),
});
export type DownloadRequest = z.infer<typeof DownloadRequestSchema>;

// 자막 다운로드 요청 (언어 코드 예: "en", "pt-BR", "zh-Hans")
export const SubtitleDownloadRequestSchema = z.object({
  url: z.url(),
  lang: z.string().regex(/^[A-Za-z0-9_-]{1,32}$/),
});
export type SubtitleDownloadRequest = z.infer<typeof SubtitleDownloadRequestSchema>;
