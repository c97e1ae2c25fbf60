import { TrackDescriptor } from '../types';

/**
 * Writes track metadata into a finished file. Implementations never throw.
 */
export interface TaggingSink {
  apply(filePath: string, track: TrackDescriptor): Promise<void>;
}
