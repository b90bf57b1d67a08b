export { logger, createLogger } from './logger.js';
export { TailBuffer, truncationMarker } from './tail-buffer.js';
export { formatDuration, formatBytes } from './format.js';
