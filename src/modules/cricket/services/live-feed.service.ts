import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { AxiosResponse } from 'axios';
import { firstValueFrom } from 'rxjs';
import { WinstonLoggerService } from '../../../common/logger/winston-logger.service';
import { FetchError } from '../errors/feed.errors';
import { LiveMatch } from '../interfaces/live-match.interface';
import { FeedParsePolicy, parseMatches } from '../utils/feed-parser';

export const DEFAULT_FEED_URL = 'http://synd.cricbuzz.com/j2me/1.0/livematches.xml';

/**
 * Cricbuzz live matches feed
 *
 * One GET per call, no caching and no retries. Each call returns one
 * record per datapath in the order the feed first mentions it.
 */
@Injectable()
export class LiveFeedService {
  private feedUrl: string;
  private timeoutMs: number;
  private parsePolicy: FeedParsePolicy;

  constructor(
    private httpService: HttpService,
    private configService: ConfigService,
    private logger: WinstonLoggerService,
  ) {
    this.feedUrl = this.configService.get<string>('CRICBUZZ_FEED_URL', DEFAULT_FEED_URL);
    this.timeoutMs = this.configService.get<number>('CRICBUZZ_FEED_TIMEOUT_MS', 10000);
    this.parsePolicy = this.configService.get<FeedParsePolicy>('FEED_PARSE_POLICY', 'abort');
  }

  async fetchFeed(url: string = this.feedUrl): Promise<string> {
    this.logger.debug(`Fetching live feed from ${url}`, 'LiveFeedService');

    let response: AxiosResponse<string>;
    try {
      response = await firstValueFrom(
        this.httpService.get<string>(url, {
          responseType: 'text',
          timeout: this.timeoutMs,
          // every status resolves; non-200 is handled below
          validateStatus: () => true,
        }),
      );
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Live feed request to ${url} failed: ${reason}`,
        error instanceof Error ? error.stack : undefined,
        'LiveFeedService',
      );
      throw new FetchError(null, `Live feed request failed: ${reason}`);
    }

    if (response.status !== 200) {
      this.logger.error(`Live feed returned ${response.status}`, undefined, 'LiveFeedService');
      throw new FetchError(response.status);
    }

    return response.data;
  }

  async getLiveMatches(url?: string): Promise<LiveMatch[]> {
    const xml = await this.fetchFeed(url);

    const { matches, rawCount, skipped } = parseMatches(xml, {
      policy: this.parsePolicy,
      onSkip: (datapath, error) => {
        this.logger.warn(`Skipping malformed match ${datapath}: ${error.message}`, error.stack, 'LiveFeedService');
      },
    });

    this.logger.debug(
      `Parsed ${rawCount} match reports into ${matches.length} matches` +
        (skipped.length ? `, skipped ${skipped.length}` : ''),
      'LiveFeedService',
    );

    return matches;
  }

  async getLiveMatch(datapath: string, url?: string): Promise<LiveMatch | undefined> {
    const matches = await this.getLiveMatches(url);
    return matches.find((match) => match.datapath === datapath);
  }
}
