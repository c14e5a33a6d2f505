import { LiveMatch, LiveMatchResponse } from '../interfaces/live-match.interface';
import { formatMatchTime } from './match-time';

/**
 * Shape a merged match for the HTTP and CLI surfaces. Only the start time
 * changes; every other key passes through untouched.
 */
export function toLiveMatchResponse(match: LiveMatch): LiveMatchResponse {
  const { time, ...rest } = match;
  return { ...rest, time: formatMatchTime(time) };
}

export function toLiveMatchResponses(matches: LiveMatch[]): LiveMatchResponse[] {
  return matches.map(toLiveMatchResponse);
}
