export type { MetadataMatch, MetadataProvider } from './MetadataProvider';
export { mergeMissing, needsEnrichment } from './MetadataProvider';
export { MusicBrainzProvider } from './MusicBrainzProvider';
