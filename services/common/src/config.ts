export interface RuntimeConfig {
  serviceName: string;
  env: string;
  logLevel: string;
  enableRequestLogging: boolean;
  port: number;
}

export interface MonitoringConfig {
  traceHeader: string;
  propagateTrace: boolean;
  requestIdHeader: string;
}

export interface ServiceConfig {
  runtime: RuntimeConfig;
  monitoring: MonitoringConfig;
}

let cachedConfig: ServiceConfig | null = null;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function resolveLogLevel(): string {
  const value = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (!value) {
    return 'info';
  }

  return LOG_LEVELS.some((level) => level === value) ? value : 'info';
}

function validateConfig(config: ServiceConfig): void {
  const { runtime, monitoring } = config;

  if (!Number.isInteger(runtime.port) || runtime.port <= 0 || runtime.port > 65_535) {
    throw new Error(`PORT must be an integer between 1 and 65535, received ${runtime.port}.`);
  }

  if (monitoring.propagateTrace && !monitoring.traceHeader) {
    throw new Error('TRACE_HEADER must be provided when propagate trace context is enabled.');
  }
}

export function loadConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const config: ServiceConfig = {
    runtime: {
      serviceName: process.env.SERVICE_NAME ?? 'jobfit-service',
      env: process.env.NODE_ENV ?? 'development',
      logLevel: resolveLogLevel(),
      enableRequestLogging: parseBoolean(process.env.ENABLE_REQUEST_LOGGING, true),
      port: parseNumber(process.env.PORT, 8080)
    },
    monitoring: {
      traceHeader: process.env.TRACE_HEADER ?? 'traceparent',
      propagateTrace: parseBoolean(process.env.PROPAGATE_TRACE_CONTEXT, true),
      requestIdHeader: process.env.REQUEST_ID_HEADER ?? 'X-Request-ID'
    }
  };

  validateConfig(config);
  cachedConfig = config;

  return cachedConfig;
}

export function getConfig(): ServiceConfig {
  return cachedConfig ?? loadConfig();
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
