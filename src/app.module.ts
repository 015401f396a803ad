import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';
import { ProcessingModule } from './processing/processing.module';

/**
 * Application Module
 * Queue-driven document export service: the worker pool consumes job
 * messages, the sweeper enforces retention, and the use cases in
 * ApplicationModule form the surface for callers.
 */
@Module({
  imports: [ConfigModule, SharedModule, ApplicationModule, ProcessingModule],
})
export class AppModule {}
