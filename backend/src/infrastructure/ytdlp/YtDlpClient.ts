import { execFile, spawn } from 'child_process';
import { promisify } from 'util';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Readable } from 'stream';
import type { FormatInfo } from '@vidgate/types';
import {
  RawVideoInfoSchema,
  type MediaSource,
  type RawVideoInfo,
  type SubtitleExt,
  type SubtitleFile,
} from '../../services/types.js';
import { logger } from '../../utils/index.js';
//------------------------------------------------------------------------------//
const execFileAsync = promisify(execFile);

// 영상 컨테이너별로 함께 받을 오디오 (컨테이너를 바꾸지 않고 합칠 수 있는 코덱)
const MERGE_AUDIO_EXT: Record<string, string> = {
  mp4: 'm4a',
  webm: 'webm',
};

const SUBTITLE_EXTS: readonly SubtitleExt[] = ['srt', 'vtt'];

/**
 * 다운로드용 yt-dlp 인자
 * 오디오가 없는 영상 포맷은 최고 음질 오디오와 합쳐 같은 컨테이너로 표준 출력에 씁니다.
 */
export function buildDownloadArgs(url: string, format: FormatInfo): string[] {
  const base = ['--no-warnings', '--no-playlist', '-o', '-', url];
  const audioExt = MERGE_AUDIO_EXT[format.ext];

  if (format.hasAudio || !audioExt) {
    return ['-f', format.formatId, ...base];
  }

  const selector = `${format.formatId}+bestaudio[ext=${audioExt}]/${format.formatId}+bestaudio/best`;
  return ['-f', selector, '--merge-output-format', format.ext, ...base];
}

/**
 * 자막 다운로드용 yt-dlp 인자 (결과 파일: <outputDir>/subtitle.<lang>.<ext>)
 */
export function buildSubtitleArgs(url: string, lang: string, outputDir: string): string[] {
  return [
    '--skip-download',
    '--write-subs',
    '--write-auto-subs',
    '--sub-langs',
    lang,
    '--sub-format',
    'srt/vtt/best',
    '--no-warnings',
    '--no-playlist',
    '-o',
    path.join(outputDir, 'subtitle'),
    url,
  ];
}

/**
 * 출력 디렉터리에서 요청 언어의 자막 파일 선택 (srt 우선)
 */
export function pickSubtitleFile(files: string[], lang: string): { file: string; ext: SubtitleExt } | null {
  for (const ext of SUBTITLE_EXTS) {
    const file = files.find(name => name.endsWith(`.${lang}.${ext}`));
    if (file) {
      return { file, ext };
    }
  }
  return null;
}

export interface YtDlpClientOptions {
  /** yt-dlp 실행 파일 경로 */
  binaryPath?: string;
  /** 메타데이터 추출 타임아웃 (ms) */
  timeoutMs?: number;
}

/**
 * yt-dlp 기반 미디어 추출기
 *
 * 책임:
 * - yt-dlp 실행 및 JSON 메타데이터 파싱
 * - 선택 포맷을 표준 출력 스트림으로 다운로드
 * - 자막 파일을 임시 디렉터리에 받아 읽은 뒤 정리
 *
 * Infrastructure Layer: 외부 도구(yt-dlp)에 대한 직접적인 의존성
 */
export class YtDlpClient implements MediaSource {
  private readonly binaryPath: string;
  private readonly timeoutMs: number;
  private cachedVersion: string | null | undefined;

  constructor(options: YtDlpClientOptions = {}) {
    this.binaryPath = options.binaryPath ?? 'yt-dlp';
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async extractInfo(url: string, signal?: AbortSignal): Promise<RawVideoInfo> {
    logger.info('source', `Extracting video info: ${url}`);

    try {
      const { stdout } = await execFileAsync(
        this.binaryPath,
        ['--dump-single-json', '--skip-download', '--no-warnings', '--no-playlist', url],
        {
          encoding: 'utf8',
          timeout: this.timeoutMs,
          maxBuffer: 32 * 1024 * 1024, // 32MB 버퍼 (포맷 목록이 큼)
          signal,
        }
      );

      return RawVideoInfoSchema.parse(JSON.parse(stdout));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('source', `Error extracting video info: ${url}`, { message });
      throw Object.assign(new Error(`Failed to extract video information: ${message}`), { statusCode: 400 });
    }
  }

  openDownload(url: string, format: FormatInfo): Readable {
    const { formatId } = format;
    logger.info('source', `Starting download: ${url} [${formatId}${format.hasAudio ? '' : '+bestaudio'}]`);

    const child = spawn(this.binaryPath, buildDownloadArgs(url, format), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stderr = '';
    child.stderr.on('data', (chunk: Buffer) => {
      // 진행률 출력이 길어질 수 있으므로 마지막 부분만 유지
      stderr = (stderr + chunk.toString()).slice(-4096);
    });

    child.on('error', error => {
      logger.error('source', `Failed to start yt-dlp: ${error.message}`);
      child.stdout.destroy(error);
    });

    child.on('close', code => {
      if (code !== 0 && code !== null) {
        logger.error('source', `yt-dlp exited with code ${code}`, { url, formatId, stderr: stderr.trim() });
        child.stdout.destroy(new Error(`yt-dlp exited with code ${code}`));
      }
    });

    // 클라이언트가 연결을 끊으면 프로세스도 종료
    child.stdout.on('close', () => {
      if (child.exitCode === null) {
        child.kill('SIGTERM');
      }
    });

    return child.stdout;
  }

  async downloadSubtitle(url: string, lang: string, signal?: AbortSignal): Promise<SubtitleFile> {
    logger.info('source', `Downloading subtitle: ${url} [${lang}]`);
    const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vidgate-subtitle-'));

    try {
      try {
        await execFileAsync(this.binaryPath, buildSubtitleArgs(url, lang, outputDir), {
          encoding: 'utf8',
          timeout: this.timeoutMs,
          signal,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('source', `Error downloading subtitle: ${url}`, { lang, message });
        throw Object.assign(new Error(`Failed to download subtitle: ${message}`), { statusCode: 400 });
      }

      const picked = pickSubtitleFile(await fs.readdir(outputDir), lang);
      if (!picked) {
        throw Object.assign(new Error(`Subtitle not found for language: ${lang}`), { statusCode: 404 });
      }

      const content = await fs.readFile(path.join(outputDir, picked.file));
      return { ext: picked.ext, content };
    } finally {
      // 임시 디렉터리 정리
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  }

  async getVersion(): Promise<string | null> {
    if (this.cachedVersion !== undefined) {
      return this.cachedVersion;
    }

    try {
      const { stdout } = await execFileAsync(this.binaryPath, ['--version'], { encoding: 'utf8', timeout: 10_000 });
      this.cachedVersion = stdout.trim() || null;
    } catch (error) {
      logger.debug('source', `yt-dlp not available: ${error instanceof Error ? error.message : String(error)}`);
      this.cachedVersion = null;
    }

    return this.cachedVersion;
  }
}
