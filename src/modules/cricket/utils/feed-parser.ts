import { load } from 'cheerio';
import { ParseError } from '../errors/feed.errors';
import { LiveMatch } from '../interfaces/live-match.interface';
import { groupBy } from './group-by';
import { joinMatchGroup } from './match-parser';

export type FeedParsePolicy = 'abort' | 'skip';

export interface ParseMatchesOptions {
  /** `abort` rethrows the first ParseError, `skip` drops the offending match. */
  policy?: FeedParsePolicy;
  onSkip?: (datapath: string, error: ParseError) => void;
}

export interface ParsedFeed {
  matches: LiveMatch[];
  rawCount: number;
  skipped: string[];
}

/**
 * Turn the provider's livematches document into one record per datapath.
 * The provider repeats some matches with slightly different details, so
 * every report sharing a datapath is merged into the first one's slot.
 */
export function parseMatches(xml: string, options: ParseMatchesOptions = {}): ParsedFeed {
  const policy = options.policy ?? 'abort';
  const $ = load(xml, { xmlMode: true });
  const elements = $('match');

  const matches: LiveMatch[] = [];
  const skipped: string[] = [];

  for (const group of groupBy('datapath', elements)) {
    try {
      matches.push(joinMatchGroup(group.elements));
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      const tagged = error.withDatapath(group.key);
      if (policy === 'abort') {
        throw tagged;
      }
      skipped.push(group.key);
      options.onSkip?.(group.key, tagged);
    }
  }

  return { matches, rawCount: elements.length, skipped };
}
