export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
  enableRequestLogging: boolean;
}

export interface MonitoringConfig {
  requestIdHeader: string;
}

export interface ServiceConfig {
  runtime: RuntimeConfig;
  monitoring: MonitoringConfig;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

let cachedConfig: ServiceConfig | null = null;

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

  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

function validateConfig(config: ServiceConfig): void {
  if (config.runtime.serviceName.trim().length === 0) {
    throw new Error('SERVICE_NAME must not be blank.');
  }

  if (config.monitoring.requestIdHeader.trim().length === 0) {
    throw new Error('REQUEST_ID_HEADER must not be blank.');
  }
}

export function loadConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const config: ServiceConfig = {
    runtime: {
      serviceName: process.env.SERVICE_NAME ?? 'skillgap-service',
      logLevel: resolveLogLevel(),
      enableRequestLogging: parseBoolean(process.env.ENABLE_REQUEST_LOGGING, true)
    },
    monitoring: {
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
