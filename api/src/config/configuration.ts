// Centralized, typed configuration for the API.
// Read once at start-up; the returned object is frozen and never mutated.

export type ChartStyle = 'detailed' | 'minimal';

export interface PolygonConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface AuthConfig {
  username: string;
  password: string;
}

export interface ChartConfig {
  style: ChartStyle;
  timeZone: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  polygon: PolygonConfig;
  auth: AuthConfig;
  chart: ChartConfig;
}

export const DEFAULT_POLYGON_BASE_URL = 'https://api.polygon.io';
export const DEFAULT_TIME_ZONE = 'America/New_York';

function parseChartStyle(value: string | undefined): ChartStyle {
  return value?.toLowerCase() === 'minimal' ? 'minimal' : 'detailed';
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

function parseTimeZone(value: string | undefined): string {
  return value && isValidTimeZone(value) ? value : DEFAULT_TIME_ZONE;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const n = parseInt(value ?? '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function buildConfig(env: NodeJS.ProcessEnv): AppConfig {
  return Object.freeze({
    nodeEnv: env.NODE_ENV ?? 'development',
    port: parseInteger(env.PORT, 8080),

    polygon: Object.freeze({
      apiKey: env.POLYGON_API_KEY ?? '',
      baseUrl: env.POLYGON_BASE_URL || DEFAULT_POLYGON_BASE_URL,
      timeoutMs: parseInteger(env.POLYGON_TIMEOUT_MS, 10_000),
    }),

    auth: Object.freeze({
      username: env.BASIC_AUTH_USERNAME || 'admin',
      password: env.BASIC_AUTH_PASSWORD ?? '',
    }),

    chart: Object.freeze({
      style: parseChartStyle(env.CHART_STYLE),
      timeZone: parseTimeZone(env.CHART_TIMEZONE),
    }),
  });
}

/** Names of secrets that are missing from the given configuration. */
export function missingSecrets(config: Pick<AppConfig, 'polygon' | 'auth'>): string[] {
  const missing: string[] = [];
  if (!config.polygon.apiKey) missing.push('POLYGON_API_KEY');
  if (!config.auth.password) missing.push('BASIC_AUTH_PASSWORD');
  return missing;
}

/** Settings that were set but unusable and replaced by their defaults. */
export function ignoredSettings(env: NodeJS.ProcessEnv): string[] {
  const ignored: string[] = [];
  if (env.CHART_TIMEZONE && !isValidTimeZone(env.CHART_TIMEZONE)) ignored.push('CHART_TIMEZONE');
  return ignored;
}

// Export a default factory so ConfigModule.load can consume it.
export default (): AppConfig => buildConfig(process.env);
