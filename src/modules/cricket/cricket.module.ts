import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { CricketController } from './cricket.controller';
import { LiveFeedService } from './services/live-feed.service';
import { LoggerModule } from '../../common/logger/logger.module';

@Module({
  imports: [HttpModule, LoggerModule],
  controllers: [CricketController],
  providers: [LiveFeedService],
  exports: [LiveFeedService],
})
export class CricketModule {}
