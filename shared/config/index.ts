/**
 * Shared Configuration - Temperature Gateway
 * Environment-based configuration with defaults
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SoapConfig {
  wsdlUrl: string;
  endpointUrl?: string;
  timeout: number;
  circuitBreaker: boolean;
}

export interface BatchConfig {
  /** 0 means no limit */
  maxItems: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  serviceName: string;
  logLevel: LogLevel;
  corsOrigins: string[];
  soap: SoapConfig;
  batch: BatchConfig;
}

const ENVIRONMENTS: ReadonlyArray<AppConfig['env']> = ['development', 'test', 'production'];
const LOG_LEVELS: ReadonlyArray<LogLevel> = ['debug', 'info', 'warn', 'error'];

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${key} is required`);
  }
  return value;
}

function getEnvInt(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${key} is required`);
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got "${value}"`);
  }
  return parsed;
}

function getEnvBool(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${key} is required`);
  }
  return value.toLowerCase() === 'true';
}

function getEnvChoice<T extends string>(key: string, choices: ReadonlyArray<T>, defaultValue: T): T {
  const value = getEnv(key, defaultValue);
  const match = choices.find(choice => choice === value.toLowerCase());
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}

export function loadConfig(serviceName: string): AppConfig {
  const endpointUrl = process.env['SOAP_ENDPOINT_URL'];

  return {
    env: getEnvChoice('NODE_ENV', ENVIRONMENTS, 'development'),
    port: getEnvInt('PORT', 8000),
    serviceName,
    logLevel: getEnvChoice('LOG_LEVEL', LOG_LEVELS, 'info'),
    corsOrigins: getEnv('CORS_ORIGINS', '*').split(',').map(origin => origin.trim()),

    soap: {
      wsdlUrl: getEnv('SOAP_WSDL_URL', TemperatureConstants.DEFAULT_WSDL_URL),
      ...(endpointUrl && { endpointUrl }),
      timeout: getEnvInt('SOAP_TIMEOUT_MS', 10000),
      circuitBreaker: getEnvBool('SOAP_CIRCUIT_BREAKER', false),
    },

    batch: {
      maxItems: getEnvInt('BATCH_MAX_ITEMS', 0),
    },
  };
}

// Temperature conversion constants
export const TemperatureConstants = {
  API_VERSION: '1.0.0',

  DEFAULT_WSDL_URL: 'https://www.w3schools.com/xml/tempconvert.asmx?WSDL',

  // Remote operation name and its single argument, per source unit
  OPERATIONS: {
    fahrenheit: { name: 'FahrenheitToCelsius', argument: 'Fahrenheit' },
    celsius: { name: 'CelsiusToFahrenheit', argument: 'Celsius' },
  },

  SYMBOLS: {
    celsius: '°C',
    fahrenheit: '°F',
  },
} as const;

export const Namespaces = {
  soap: 'http://schemas.xmlsoap.org/soap/envelope/',
} as const;
