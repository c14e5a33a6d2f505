import { Controller, Get, NotFoundException, Query } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { LiveFeedService } from './services/live-feed.service';
import { GetLiveMatchDto } from './dto/get-live-match.dto';
import { LiveMatchResponse } from './interfaces/live-match.interface';
import { toLiveMatchResponse, toLiveMatchResponses } from './utils/match-transformers';

@ApiTags('cricket')
@Controller('cricket')
export class CricketController {
  constructor(private readonly liveFeedService: LiveFeedService) {}

  @Get('matches/live')
  @ApiOperation({ summary: 'Get live cricket matches from the provider feed' })
  @ApiResponse({ status: 200, description: 'Live matches retrieved successfully' })
  @ApiResponse({ status: 502, description: 'Feed unavailable or malformed' })
  async getLiveMatches(): Promise<LiveMatchResponse[]> {
    // Always fetch fresh data - no caching
    const matches = await this.liveFeedService.getLiveMatches();
    return toLiveMatchResponses(matches);
  }

  @Get('matches/live/find')
  @ApiOperation({ summary: 'Get one live match by its feed datapath' })
  @ApiResponse({ status: 200, description: 'Match retrieved successfully' })
  @ApiResponse({ status: 404, description: 'Match not in the feed' })
  async getLiveMatch(@Query() query: GetLiveMatchDto): Promise<LiveMatchResponse> {
    const match = await this.liveFeedService.getLiveMatch(query.datapath);
    if (!match) {
      throw new NotFoundException(`No live match with datapath ${query.datapath}`);
    }
    return toLiveMatchResponse(match);
  }
}
