import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { TempWorkspaceService } from './services/temp-workspace.service';

// Use Cases
import {
  SubmitExportUseCase,
  GetJobStatusUseCase,
  GetArtifactStreamUseCase,
  DeleteJobUseCase,
  ProcessExportJobUseCase,
  SweepExpiredJobsUseCase,
  FailStaleJobsUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (string tokens) only. The adapters bound
 * to those tokens come from the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    TempWorkspaceService,
    // Use Cases
    SubmitExportUseCase,
    GetJobStatusUseCase,
    GetArtifactStreamUseCase,
    DeleteJobUseCase,
    ProcessExportJobUseCase,
    SweepExpiredJobsUseCase,
    FailStaleJobsUseCase,
  ],
  exports: [
    TempWorkspaceService,
    // Exported for driving adapters (worker pool, sweeper, a future HTTP layer)
    SubmitExportUseCase,
    GetJobStatusUseCase,
    GetArtifactStreamUseCase,
    DeleteJobUseCase,
    ProcessExportJobUseCase,
    SweepExpiredJobsUseCase,
    FailStaleJobsUseCase,
  ],
})
export class ApplicationModule {}
