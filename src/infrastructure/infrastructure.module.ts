import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import { AppConfig } from '../config/configuration';
import { EXPORT_SETTINGS, ExportSettings } from '../config/export-settings';

// Shared services (AWS clients, logging)
import { SqsModule } from '../shared/aws/sqs/sqs.module';
import { S3Module } from '../shared/aws/s3/s3.module';
import { S3Service } from '../shared/aws/s3/s3.service';
import { DynamoDbModule } from '../shared/aws/dynamodb/dynamodb.module';
import { LoggingModule } from '../shared/logging/logging.module';

// Injection tokens (string symbols for DI)
import {
  ARTIFACT_RENDERER_PORT,
  ARTIFACT_STORAGE_PORT,
  BUNDLE_BUILDER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_PAYLOAD_STORE_PORT,
  JOB_STATE_REPOSITORY_PORT,
  MESSAGE_QUEUE_PORT,
} from '../application/ports/tokens';
import { ArtifactStoragePort } from '../application/ports/output/artifact-storage.port';
import { JobPayloadStorePort } from '../application/ports/output/job-payload-store.port';

// Adapters (implementations)
import { DynamoDbJobRepositoryAdapter } from './adapters/persistence/dynamodb-job-repository.adapter';
import { SqsMessageQueueAdapter } from './adapters/messaging/sqs-message-queue.adapter';
import { S3ArtifactStorageAdapter } from './adapters/storage/s3-artifact-storage.adapter';
import { FilesystemArtifactStorageAdapter } from './adapters/storage/filesystem-artifact-storage.adapter';
import { S3JobPayloadStoreAdapter } from './adapters/storage/s3-job-payload-store.adapter';
import { FilesystemJobPayloadStoreAdapter } from './adapters/storage/filesystem-job-payload-store.adapter';
import { ConsoleEventPublisherAdapter } from './adapters/events/console-event-publisher.adapter';
import { ZipBundleBuilderAdapter } from './adapters/bundling/zip-bundle-builder.adapter';
import { DocxRenderer } from './adapters/rendering/docx.renderer';
import { XlsxRenderer } from './adapters/rendering/xlsx.renderer';
import { PptxRenderer } from './adapters/rendering/pptx.renderer';
import { PdfRenderer } from './adapters/rendering/pdf.renderer';
import { TxtRenderer } from './adapters/rendering/txt.renderer';
import { RendererRegistry } from './adapters/rendering/renderer-registry';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure modules (AWS services, logging)
 * 2. Binds each port token to its adapter; storage adapters are chosen by
 *    STORAGE_DRIVER
 * 3. Exports the port tokens so they can be injected into use cases
 */
@Module({
  imports: [LoggingModule, SqsModule, S3Module, DynamoDbModule],
  providers: [
    // Persistence adapters
    DynamoDbJobRepositoryAdapter,
    {
      provide: JOB_STATE_REPOSITORY_PORT,
      useExisting: DynamoDbJobRepositoryAdapter,
    },

    // Messaging adapters
    SqsMessageQueueAdapter,
    {
      provide: MESSAGE_QUEUE_PORT,
      useExisting: SqsMessageQueueAdapter,
    },

    // Storage adapters
    {
      provide: ARTIFACT_STORAGE_PORT,
      inject: [ConfigService, S3Service, EXPORT_SETTINGS],
      useFactory: (
        configService: ConfigService<AppConfig>,
        s3: S3Service,
        settings: ExportSettings,
      ): ArtifactStoragePort => {
        const storage = configService.getOrThrow('storage', { infer: true });
        return storage.driver === 's3'
          ? new S3ArtifactStorageAdapter(s3, settings.artifactTtlMs)
          : new FilesystemArtifactStorageAdapter(
              join(storage.directory, 'artifacts'),
              settings.artifactTtlMs,
            );
      },
    },
    {
      provide: JOB_PAYLOAD_STORE_PORT,
      inject: [ConfigService, S3Service],
      useFactory: (configService: ConfigService<AppConfig>, s3: S3Service): JobPayloadStorePort => {
        const storage = configService.getOrThrow('storage', { infer: true });
        return storage.driver === 's3'
          ? new S3JobPayloadStoreAdapter(s3)
          : new FilesystemJobPayloadStoreAdapter(storage.directory);
      },
    },

    // Rendering and bundling
    DocxRenderer,
    XlsxRenderer,
    PptxRenderer,
    PdfRenderer,
    TxtRenderer,
    RendererRegistry,
    {
      provide: ARTIFACT_RENDERER_PORT,
      useExisting: RendererRegistry,
    },
    ZipBundleBuilderAdapter,
    {
      provide: BUNDLE_BUILDER_PORT,
      useExisting: ZipBundleBuilderAdapter,
    },

    // Event publisher adapter
    ConsoleEventPublisherAdapter,
    {
      provide: EVENT_PUBLISHER_PORT,
      useExisting: ConsoleEventPublisherAdapter,
    },
  ],
  exports: [
    JOB_STATE_REPOSITORY_PORT,
    JOB_PAYLOAD_STORE_PORT,
    ARTIFACT_STORAGE_PORT,
    MESSAGE_QUEUE_PORT,
    ARTIFACT_RENDERER_PORT,
    BUNDLE_BUILDER_PORT,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}
