import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';
import { EXPORT_SETTINGS, exportSettingsProvider } from './export-settings';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
    }),
  ],
  providers: [exportSettingsProvider],
  exports: [EXPORT_SETTINGS],
})
export class ConfigModule {}
