export { errorHandler } from './errorHandler.js';
export { notFoundHandler } from './notFoundHandler.js';
