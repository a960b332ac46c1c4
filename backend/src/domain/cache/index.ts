export { normalizeLocator, extractYoutubeId } from './cacheKey.js';
