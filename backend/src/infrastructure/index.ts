export * from './ytdlp/index.js';
