import { Inject, Injectable } from '@nestjs/common';
import type { UnresolvedLinkPolicy } from '../reconcile/upsert-resolver';
import type { AppConfig } from './app-config';
import { ConfigError } from './config-loader';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type PlexConnection = { baseUrl: string; token: string };
export type SonarrConnection = { baseUrl: string; apiKey: string };

@Injectable()
export class SettingsService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get dataDir(): string {
    return this.config.dataDir;
  }

  get databasePath(): string {
    return this.config.databasePath;
  }

  get unresolvedPolicy(): UnresolvedLinkPolicy {
    return this.config.unresolvedPolicy;
  }

  get filesystemDirs(): readonly string[] {
    return this.config.filesystem.dirs;
  }

  requirePlexConnection(): PlexConnection {
    const { baseUrl, token } = this.config.plex;
    if (!baseUrl || !token) {
      throw new ConfigError(
        'Plex is not configured: set plex.url and plex.token (or --plex-url / --plex-token)',
      );
    }
    return { baseUrl, token };
  }

  requireSonarrConnection(): SonarrConnection {
    const { baseUrl, apiKey } = this.config.sonarr;
    if (!baseUrl || !apiKey) {
      throw new ConfigError(
        'Sonarr is not configured: set sonarr.url and sonarr.api_key (or --sonarr-url / --sonarr-api-key)',
      );
    }
    return { baseUrl, apiKey };
  }
}
