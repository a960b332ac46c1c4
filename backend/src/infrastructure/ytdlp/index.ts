export {
  YtDlpClient,
  buildDownloadArgs,
  buildSubtitleArgs,
  pickSubtitleFile,
  type YtDlpClientOptions,
} from './YtDlpClient.js';
