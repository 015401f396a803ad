import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { ExportWorkerPoolService } from './services/export-worker-pool.service';
import { RetentionSweeperService } from './services/retention-sweeper.service';

/**
 * Processing Module
 * Driving adapters that run in the background: the worker pool consuming the
 * job queue and the retention sweeper.
 */
@Module({
  imports: [ApplicationModule],
  providers: [ExportWorkerPoolService, RetentionSweeperService],
  exports: [ExportWorkerPoolService, RetentionSweeperService],
})
export class ProcessingModule {}
