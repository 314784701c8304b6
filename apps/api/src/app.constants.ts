export const APP_NAME = 'tvledger';

export const DATA_DIR_NAME = 'data';
export const DATABASE_FILE_NAME = 'tvledger.sqlite';
export const CONFIG_FILE_NAME = 'tvledger.yaml';

export const PLEX_REQUEST_TIMEOUT_MS = 60_000;
export const SONARR_REQUEST_TIMEOUT_MS = 30_000;

export const RECONCILE_PROGRESS_EVERY = 500;
export const STATUS_DEFAULT_RUN_LIMIT = 10;
