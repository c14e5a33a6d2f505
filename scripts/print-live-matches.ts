import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { LiveFeedService } from '../src/modules/cricket/services/live-feed.service';
import { toLiveMatchResponse } from '../src/modules/cricket/utils/match-transformers';

// Usage: print-live-matches [feed-url]
async function printLiveMatches() {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });

  try {
    const matches = await app.get(LiveFeedService).getLiveMatches(process.argv[2]);
    for (const match of matches) {
      console.log(JSON.stringify(toLiveMatchResponse(match), null, 2));
    }
  } finally {
    await app.close();
  }
}

printLiveMatches().catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
