export const USEEIO_LOAD_EVENT = {
  STARTED: 'USEEIO_LOAD_STARTED',
  MODEL_VERSION_CLEARED: 'USEEIO_LOAD_MODEL_VERSION_CLEARED',
  MODEL_METADATA_LOADED: 'USEEIO_LOAD_MODEL_METADATA_LOADED',
  GWP_REFERENCES_LOADED: 'USEEIO_LOAD_GWP_REFERENCES_LOADED',
  CHARACTERIZATION_LOADED: 'USEEIO_LOAD_CHARACTERIZATION_LOADED',
  CHARACTERIZATION_SKIPPED: 'USEEIO_LOAD_CHARACTERIZATION_SKIPPED',
  COMPLETED: 'USEEIO_LOAD_COMPLETED'
} as const;

export type UseeioLoadEventName = (typeof USEEIO_LOAD_EVENT)[keyof typeof USEEIO_LOAD_EVENT];

export type UseeioLoadStartedPayload = {
  modelVersion: string;
  exportDir: string;
  economicYear: number | null;
  satelliteYearMin: number | null;
  satelliteYearMax: number | null;
};

export type UseeioModelVersionClearedPayload = {
  modelVersion: string;
  characterizationRows: number;
  modelMetadataRows: number;
};

export type UseeioModelMetadataLoadedPayload = {
  modelVersion: string;
  deactivatedVersions: string[];
};

export type UseeioRowsLoadedPayload = {
  modelVersion: string;
  rows: number;
};

export type UseeioCharacterizationSkippedPayload = {
  modelVersion: string;
  reason: 'SHEET_MISSING' | 'NO_FACTORS';
};

export type UseeioLoadCompletedPayload = {
  modelVersion: string;
  gwpReferenceRows: number;
  characterizationRows: number;
  durationMs: number;
};

export type UseeioLoadEventPayloadMap = {
  [USEEIO_LOAD_EVENT.STARTED]: UseeioLoadStartedPayload;
  [USEEIO_LOAD_EVENT.MODEL_VERSION_CLEARED]: UseeioModelVersionClearedPayload;
  [USEEIO_LOAD_EVENT.MODEL_METADATA_LOADED]: UseeioModelMetadataLoadedPayload;
  [USEEIO_LOAD_EVENT.GWP_REFERENCES_LOADED]: UseeioRowsLoadedPayload;
  [USEEIO_LOAD_EVENT.CHARACTERIZATION_LOADED]: UseeioRowsLoadedPayload;
  [USEEIO_LOAD_EVENT.CHARACTERIZATION_SKIPPED]: UseeioCharacterizationSkippedPayload;
  [USEEIO_LOAD_EVENT.COMPLETED]: UseeioLoadCompletedPayload;
};

export type UseeioLoadLogger = (eventName: string, payload: unknown) => void;

/** One JSON line per event on stdout. */
export const jsonLineLogger: UseeioLoadLogger = (eventName, payload) => {
  console.log(JSON.stringify({ event: eventName, ...(typeof payload === 'object' && payload !== null ? payload : { payload }) }));
};

export function emitUseeioLoadEvent<T extends UseeioLoadEventName>(
  event: T,
  payload: UseeioLoadEventPayloadMap[T],
  logger: UseeioLoadLogger = jsonLineLogger
): void {
  logger(event, payload);
}
