import { Test } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { of, throwError } from 'rxjs';
import { WinstonLoggerService } from '../../../common/logger/winston-logger.service';
import { FetchError, ParseError } from '../errors/feed.errors';
import { DEFAULT_FEED_URL, LiveFeedService } from './live-feed.service';

const TIME = '<Tme Dt="12 May 2016" stTme="1400"/>';

const FEED = `<mchdata>
  <match datapath="123" grnd="Wankhede">${TIME}</match>
  <match datapath="456" grnd="Chepauk" vcity="Chennai">${TIME}</match>
  <match datapath="123" vcity="Mumbai">${TIME}</match>
</mchdata>`;

const MALFORMED_FEED = `<mchdata>
  <match datapath="123">${TIME}</match>
  <match datapath="789"/>
</mchdata>`;

describe('LiveFeedService', () => {
  const httpService = { get: jest.fn() };
  const logger = { debug: jest.fn(), warn: jest.fn(), error: jest.fn(), log: jest.fn() };

  async function createService(config: Record<string, unknown> = {}): Promise<LiveFeedService> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        LiveFeedService,
        { provide: HttpService, useValue: httpService },
        {
          provide: ConfigService,
          useValue: { get: (key: string, fallback?: unknown) => (key in config ? config[key] : fallback) },
        },
        { provide: WinstonLoggerService, useValue: logger },
      ],
    }).compile();

    return moduleRef.get(LiveFeedService);
  }

  const respond = (status: number, data: string) => httpService.get.mockReturnValue(of({ status, data }));

  beforeEach(() => {
    jest.resetAllMocks();
  });

  it('requests the default feed as text', async () => {
    const service = await createService();
    respond(200, FEED);

    await service.getLiveMatches();

    expect(httpService.get).toHaveBeenCalledWith(
      DEFAULT_FEED_URL,
      expect.objectContaining({ responseType: 'text', timeout: 10000 }),
    );
  });

  it('uses the configured feed url and timeout', async () => {
    const service = await createService({ CRICBUZZ_FEED_URL: 'http://feed.test/live.xml', CRICBUZZ_FEED_TIMEOUT_MS: 2500 });
    respond(200, FEED);

    await service.getLiveMatches();

    expect(httpService.get).toHaveBeenCalledWith(
      'http://feed.test/live.xml',
      expect.objectContaining({ timeout: 2500 }),
    );
  });

  it('prefers an explicit url', async () => {
    const service = await createService();
    respond(200, FEED);

    await service.getLiveMatches('http://other.test/feed.xml');

    expect(httpService.get.mock.calls[0][0]).toBe('http://other.test/feed.xml');
  });

  it('returns merged matches in first-seen order', async () => {
    const service = await createService();
    respond(200, FEED);

    const matches = await service.getLiveMatches();

    expect(matches).toEqual([
      { datapath: '123', ground: 'Wankhede', city: 'Mumbai', time: new Date('2016-05-12T14:00:00Z') },
      { datapath: '456', ground: 'Chepauk', city: 'Chennai', time: new Date('2016-05-12T14:00:00Z') },
    ]);
  });

  it('raises FetchError carrying the status on a non-200 answer', async () => {
    const service = await createService();
    respond(503, 'Service Unavailable');

    await expect(service.getLiveMatches()).rejects.toEqual(new FetchError(503));
    await expect(service.getLiveMatches()).rejects.toMatchObject({ status: 503 });
  });

  it('treats other success codes as failures too', async () => {
    const service = await createService();
    respond(204, '');

    await expect(service.getLiveMatches()).rejects.toBeInstanceOf(FetchError);
  });

  it('raises FetchError without a status when the request itself fails', async () => {
    const service = await createService();
    httpService.get.mockReturnValue(throwError(() => new Error('getaddrinfo ENOTFOUND synd.cricbuzz.com')));

    const failure = service.getLiveMatches();

    await expect(failure).rejects.toMatchObject({
      name: 'FetchError',
      status: null,
      message: 'Live feed request failed: getaddrinfo ENOTFOUND synd.cricbuzz.com',
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('aborts on a malformed match by default', async () => {
    const service = await createService();
    respond(200, MALFORMED_FEED);

    await expect(service.getLiveMatches()).rejects.toBeInstanceOf(ParseError);
  });

  it('skips a malformed match when configured to', async () => {
    const service = await createService({ FEED_PARSE_POLICY: 'skip' });
    respond(200, MALFORMED_FEED);

    const matches = await service.getLiveMatches();

    expect(matches.map((match) => match.datapath)).toEqual(['123']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping malformed match 789: Match has no Tme element (datapath 789)',
      expect.any(String),
      'LiveFeedService',
    );
  });

  describe('getLiveMatch', () => {
    it('finds a match by datapath', async () => {
      const service = await createService();
      respond(200, FEED);

      await expect(service.getLiveMatch('456')).resolves.toMatchObject({ datapath: '456', city: 'Chennai' });
    });

    it('returns undefined for an unknown datapath', async () => {
      const service = await createService();
      respond(200, FEED);

      await expect(service.getLiveMatch('999')).resolves.toBeUndefined();
    });
  });
});
