import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { ConfigService } from './config/config.service';
import { AcquisitionModule } from './acquisition/acquisition.module';
import { AnalyzeModule } from './analyze/analyze.module';
import { ViewModule } from './view/view.module';

@Module({
  imports: [
    ConfigModule,
    AcquisitionModule,
    AnalyzeModule,
    ViewModule,
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => [{
        ttl: config.throttleTtl * 1000,
        limit: config.throttleLimit,
      }],
    }),
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
