export type { TaggingSink } from './TaggingSink';
export { Id3TaggingSink } from './Id3TaggingSink';
