/**
 * Provider index - exports all fetch providers
 */

export { BaseProvider } from './BaseProvider';
export { BinaryManager } from './BinaryManager';
export type { BinaryPaths } from './BinaryManager';
export { YtDlpProvider } from './YtDlpProvider';
export { InnertubeProvider } from './InnertubeProvider';
