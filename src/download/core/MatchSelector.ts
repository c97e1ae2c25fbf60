import { SearchCandidate } from '../../types';
import { parseDurationSeconds } from '../../utils/logicHelpers';

export const DURATION_TOLERANCE_SECONDS = 10;

/**
 * Pick the candidate to download for a target duration.
 *
 * Providers return results in relevance order, so the first candidate within
 * tolerance wins over a closer one further down, and the first candidate is
 * the fallback when none is within tolerance.
 */
export function selectBest(
    candidates: readonly SearchCandidate[],
    targetDurationSeconds: number,
): SearchCandidate | null {
    if (candidates.length === 0) return null;
    if (candidates.length === 1) return candidates[0];

    const withinTolerance = candidates.find(
        (candidate) =>
            Math.abs(parseDurationSeconds(candidate.duration) - targetDurationSeconds) <
            DURATION_TOLERANCE_SECONDS,
    );

    return withinTolerance ?? candidates[0];
}
