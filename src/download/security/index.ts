/**
 * Security index
 */

export { FileSanitizer, sanitizeFilename, MIN_AUDIO_BYTES } from './FileSanitizer';
