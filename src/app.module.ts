import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { configValidationSchema } from './config/config.schema';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { LoggerModule } from './common/logger/logger.module';
import { CricketModule } from './modules/cricket/cricket.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: configValidationSchema,
      envFilePath: ['.env.local', '.env'],
    }),

    // Core Modules
    LoggerModule,

    // Feature Modules
    CricketModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
