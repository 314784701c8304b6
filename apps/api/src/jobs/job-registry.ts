import type { SyncSource } from '../sources/key-models';

export type JobDefinitionInfo = {
  id: string;
  name: string;
  description: string;
  source: SyncSource;
};

export const JOB_DEFINITIONS: JobDefinitionInfo[] = [
  {
    id: 'filesystemSync',
    name: 'Filesystem Sync',
    description:
      'Walk every registered scan directory and reconcile the files table: new files are added, files that reappear are restored, files no longer on disk are marked removed.',
    source: 'filesystem',
  },
  {
    id: 'plexSync',
    name: 'Plex Sync',
    description:
      'Walk every Plex TV library (show, season, episode, media part) and reconcile the Plex series, episode and file tables.',
    source: 'plex',
  },
  {
    id: 'sonarrSync',
    name: 'Sonarr Sync',
    description:
      'Read every series, episode and episode file from Sonarr and reconcile the Sonarr series, episode and file tables.',
    source: 'sonarr',
  },
];

export function findJobDefinition(jobId: string): JobDefinitionInfo | undefined {
  return JOB_DEFINITIONS.find((j) => j.id === jobId);
}

export function jobIdForSource(source: SyncSource): string {
  const def = JOB_DEFINITIONS.find((j) => j.source === source);
  if (!def) throw new Error(`No job registered for source=${source}`);
  return def.id;
}
