// src/config/settings.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SETTINGS, buildSettings, validateEnv } from './settings';

@Global()
@Module({
  imports: [
    // Only loads .env into process.env; validation happens in the factory
    ConfigModule.forRoot(),
  ],
  providers: [
    {
      provide: SETTINGS,
      // Throws MissingConfigurationError, which aborts bootstrap
      useFactory: () => buildSettings(validateEnv(process.env)),
    },
  ],
  exports: [SETTINGS],
})
export class SettingsModule {}
