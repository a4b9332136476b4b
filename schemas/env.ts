export type EnvConfig = {
  appUrl: string | null;
  offersPageSize: number;
  maxPageSize: number;
};

const DEFAULT_OFFERS_PAGE_SIZE = 6;
const DEFAULT_MAX_PAGE_SIZE = 100;

function trimOrNull(value: string | undefined | null) {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : null;
}

function parsePositiveInt(value: string | undefined | null, fallback: number) {
  const normalized = trimOrNull(value);
  if (!normalized || !/^\d+$/.test(normalized)) {
    return fallback;
  }
  const parsed = Number(normalized);
  return parsed > 0 ? parsed : fallback;
}

type EnvSource = Record<string, string | undefined>;

export function parseEnvConfig(env: EnvSource = process.env): EnvConfig {
  const maxPageSize = parsePositiveInt(env.MAX_PAGE_SIZE, DEFAULT_MAX_PAGE_SIZE);
  return {
    appUrl: trimOrNull(env.APP_URL),
    offersPageSize: Math.min(
      parsePositiveInt(env.OFFERS_PAGE_SIZE, DEFAULT_OFFERS_PAGE_SIZE),
      maxPageSize,
    ),
    maxPageSize,
  };
}
