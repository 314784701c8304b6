import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { SONARR_REQUEST_TIMEOUT_MS } from '../app.constants';
import { SourceUnavailableError, errToMessage } from '../reconcile/reconcile.errors';
import { formatZodIssues } from '../settings/app-config';
import {
  SonarrEpisodeFileSchema,
  SonarrEpisodeSchema,
  SonarrSeriesSchema,
} from './sonarr.types';
import type {
  SonarrConnectionParams,
  SonarrEpisode,
  SonarrEpisodeFile,
  SonarrSeries,
} from './sonarr.types';

@Injectable()
export class SonarrService {
  private readonly logger = new Logger(SonarrService.name);

  async listSeries(params: SonarrConnectionParams): Promise<SonarrSeries[]> {
    return await this.getList(params, 'api/v3/series', SonarrSeriesSchema, 'list series');
  }

  async getEpisodesBySeries(
    params: SonarrConnectionParams & { seriesId: number },
  ): Promise<SonarrEpisode[]> {
    return await this.getList(
      params,
      `api/v3/episode?seriesId=${params.seriesId}`,
      SonarrEpisodeSchema,
      'list episodes',
    );
  }

  async getEpisodeFilesBySeries(
    params: SonarrConnectionParams & { seriesId: number },
  ): Promise<SonarrEpisodeFile[]> {
    return await this.getList(
      params,
      `api/v3/episodefile?seriesId=${params.seriesId}`,
      SonarrEpisodeFileSchema,
      'list episode files',
    );
  }

  private async getList<T extends z.ZodTypeAny>(
    params: SonarrConnectionParams,
    path: string,
    itemSchema: T,
    label: string,
  ): Promise<Array<z.infer<T>>> {
    const { baseUrl, apiKey } = params;
    const url = this.buildApiUrl(baseUrl, path);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), SONARR_REQUEST_TIMEOUT_MS);
    const startedAt = Date.now();

    let data: unknown;
    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'X-Api-Key': apiKey,
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new SourceUnavailableError(
          `Sonarr ${label} failed: HTTP ${res.status} ${body}`.trim(),
        );
      }

      data = await res.json();
      this.logger.debug(`Sonarr GET ${path} -> ${res.status} (${Date.now() - startedAt}ms)`);
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      throw new SourceUnavailableError(`Sonarr ${label} failed: ${errToMessage(err)}`, {
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
    }

    const parsed = z.array(itemSchema).safeParse(data);
    if (!parsed.success) {
      throw new SourceUnavailableError(
        `Sonarr ${label} returned an unexpected payload: ${formatZodIssues(parsed.error)}`,
      );
    }
    return parsed.data;
  }

  private buildApiUrl(baseUrl: string, path: string) {
    const normalized = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    return new URL(path, normalized).toString();
  }
}
