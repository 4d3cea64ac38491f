import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Typed configuration from the process environment. The container provides
 * every variable, so no `.env` file is read; an invalid environment fails
 * `configuration()` with a `ConfigurationError` at startup.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [configuration],
      cache: true,
    }),
  ],
})
export class ConfigModule {}
