import { Module } from '@nestjs/common';
import { AwsModule } from './aws/aws.module';
import { LoggingModule } from './logging/logging.module';

@Module({
  imports: [AwsModule, LoggingModule],
  exports: [AwsModule, LoggingModule],
})
export class SharedModule {}
