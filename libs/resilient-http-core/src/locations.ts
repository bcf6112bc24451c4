import type { LocationMode, StorageLocation, StorageUri } from './types';

export const initialLocation = (mode: LocationMode): StorageLocation =>
  mode === 'secondaryOnly' || mode === 'secondaryThenPrimary' ? 'secondary' : 'primary';

/** Location for the attempt after one made at `current`; only the `*Then*` modes alternate. */
export const nextLocation = (mode: LocationMode, current: StorageLocation): StorageLocation => {
  if (mode === 'primaryOnly') return 'primary';
  if (mode === 'secondaryOnly') return 'secondary';
  return current === 'primary' ? 'secondary' : 'primary';
};

export const normalizeBaseUrl = (value?: string): string | undefined => {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }
  return trimmed.replace(/\/+$/, '') || trimmed;
};

export const resolveBaseUrl = (endpoints: StorageUri, location: StorageLocation): string => {
  const base = normalizeBaseUrl(location === 'primary' ? endpoints.primary : endpoints.secondary);
  if (!base) {
    throw new Error(`No ${location} endpoint configured`);
  }
  return base;
};

export const assertLocationModeSupported = (endpoints: StorageUri, mode: LocationMode): void => {
  if (mode !== 'primaryOnly' && !normalizeBaseUrl(endpoints.secondary)) {
    throw new Error(`Location mode ${mode} requires a secondary endpoint`);
  }
};
