import { DynamicModule, Global, Module } from '@nestjs/common';
import type { AppConfig } from './app-config';
import { APP_CONFIG, SettingsService } from './settings.service';

@Global()
@Module({})
export class SettingsModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: SettingsModule,
      providers: [{ provide: APP_CONFIG, useValue: config }, SettingsService],
      exports: [SettingsService],
    };
  }
}
