import { Injectable, Logger } from '@nestjs/common';
import { XMLParser } from 'fast-xml-parser';
import { PLEX_REQUEST_TIMEOUT_MS } from '../app.constants';
import { SourceUnavailableError, errToMessage } from '../reconcile/reconcile.errors';
import type {
  PlexConnectionParams,
  PlexEpisode,
  PlexSeason,
  PlexSection,
  PlexShow,
} from './plex.types';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  // Attributes stay strings; numeric ones go through toIntOrNull.
  parseAttributeValue: false,
  allowBooleanAttributes: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asRecordArray(value: unknown): Array<Record<string, unknown>> {
  if (!value) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.filter(isRecord);
}

function toStringSafe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean')
    return String(value);
  return '';
}

function toIntOrNull(value: unknown): number | null {
  const n = typeof value === 'number' ? value : Number.parseInt(toStringSafe(value), 10);
  return Number.isInteger(n) ? n : null;
}

function mediaContainer(parsed: unknown): Record<string, unknown> {
  if (!isRecord(parsed)) return {};
  const container = parsed['MediaContainer'];
  return isRecord(container) ? container : {};
}

/**
 * Plex `key` attributes are absolute paths ("/library/metadata/12/children"),
 * so they are appended to the base URL as-is (keeping any reverse-proxy prefix).
 */
export function buildPlexUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}${path.startsWith('/') ? path : `/${path}`}`;
}

export function sanitizeUrlForLogs(raw: string): string {
  try {
    const u = new URL(raw);
    // Never log credentials if someone configured baseUrl as http(s)://user:pass@host
    u.username = '';
    u.password = '';
    for (const k of ['X-Plex-Token', 'x-plex-token', 'token']) {
      if (u.searchParams.has(k)) u.searchParams.set(k, 'REDACTED');
    }
    return u.toString();
  } catch {
    return raw;
  }
}

@Injectable()
export class PlexServerService {
  private readonly logger = new Logger(PlexServerService.name);

  async getShowSections(params: PlexConnectionParams): Promise<PlexSection[]> {
    const container = mediaContainer(
      await this.fetchXml(params, '/library/sections'),
    );

    return asRecordArray(container['Directory'])
      .map((d) => {
        const type = d['type'];
        return {
          key: toStringSafe(d['key']).trim(),
          title: toStringSafe(d['title']).trim(),
          type: typeof type === 'string' ? type.trim() : undefined,
        };
      })
      .filter((d) => d.key && d.type === 'show');
  }

  async listSectionShows(
    params: PlexConnectionParams & { sectionKey: string },
  ): Promise<PlexShow[]> {
    const container = mediaContainer(
      await this.fetchXml(
        params,
        `/library/sections/${encodeURIComponent(params.sectionKey)}/all`,
      ),
    );

    return asRecordArray(container['Directory']).map((d) => ({
      key: toStringSafe(d['key']).trim(),
      title: toStringSafe(d['title']).trim(),
    }));
  }

  async listSeasons(
    params: PlexConnectionParams & { showKey: string },
  ): Promise<PlexSeason[]> {
    const container = mediaContainer(await this.fetchXml(params, params.showKey));

    // The "All episodes" pseudo-directory has no season type; skip it so
    // episodes are not listed twice.
    return asRecordArray(container['Directory'])
      .filter((d) => d['type'] === 'season')
      .map((d) => ({
        key: toStringSafe(d['key']).trim(),
        index: toIntOrNull(d['index']),
      }))
      .filter((s) => s.key);
  }

  async listEpisodes(
    params: PlexConnectionParams & { seasonKey: string },
  ): Promise<PlexEpisode[]> {
    const container = mediaContainer(await this.fetchXml(params, params.seasonKey));

    return asRecordArray(container['Video']).map((v) => {
      const files: string[] = [];
      for (const media of asRecordArray(v['Media'])) {
        for (const part of asRecordArray(media['Part'])) {
          const file = toStringSafe(part['file']).trim();
          if (file) files.push(file);
        }
      }
      return {
        key: toStringSafe(v['key']).trim(),
        seasonNumber: toIntOrNull(v['parentIndex']),
        episodeNumber: toIntOrNull(v['index']),
        files,
      };
    });
  }

  private async fetchXml(
    params: PlexConnectionParams,
    path: string,
    timeoutMs: number = PLEX_REQUEST_TIMEOUT_MS,
  ): Promise<unknown> {
    const url = buildPlexUrl(params.baseUrl, path);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const safeUrl = sanitizeUrlForLogs(url);
    const startedAt = Date.now();

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/xml',
          'X-Plex-Token': params.token,
        },
        signal: controller.signal,
      });

      const text = await res.text().catch(() => '');
      const ms = Date.now() - startedAt;

      if (!res.ok) {
        this.logger.warn(`Plex HTTP GET ${safeUrl} -> ${res.status} (${ms}ms)`);
        throw new SourceUnavailableError(
          `Plex request failed: HTTP ${res.status} ${safeUrl}`,
        );
      }

      this.logger.debug(`Plex HTTP GET ${safeUrl} -> ${res.status} (${ms}ms)`);
      const parsed: unknown = parser.parse(text);
      return parsed;
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      const ms = Date.now() - startedAt;
      this.logger.warn(
        `Plex HTTP GET ${safeUrl} -> FAILED (${ms}ms): ${errToMessage(err)}`,
      );
      throw new SourceUnavailableError(
        `Plex request failed: ${safeUrl}: ${errToMessage(err)}`,
        { cause: err },
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}
