/**
 * Temperature Gateway Types
 * Request and response shapes plus the error taxonomy
 */

// ============================================================================
// Units
// ============================================================================

export type TemperatureUnit = 'celsius' | 'fahrenheit';

export const TEMPERATURE_UNITS: readonly [TemperatureUnit, TemperatureUnit] = ['celsius', 'fahrenheit'];

export function oppositeUnit(unit: TemperatureUnit): TemperatureUnit {
  return unit === 'celsius' ? 'fahrenheit' : 'celsius';
}

// ============================================================================
// Conversion Results
// ============================================================================

export interface ConversionResult {
  original: string;
  converted: string;
  from_unit: TemperatureUnit;
  to_unit: TemperatureUnit;
}

export interface BatchConversionResult {
  results: string[];
  total_converted: number;
  total_errors: number;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  soap_service_available: boolean;
  version: string;
}

export interface ServiceSummary {
  message: string;
  description: string;
  version: string;
  endpoints: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

export class GatewayError extends Error {
  code: ErrorCode;
  statusCode: number;
  details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, statusCode: number = 400, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = 'GatewayError';
  }
}

// Error codes
export const ErrorCodes = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  NOT_FOUND: 'NOT_FOUND',

  // Remote SOAP service
  SOAP_SERVICE_UNAVAILABLE: 'SOAP_SERVICE_UNAVAILABLE',
  CONVERSION_FAILED: 'CONVERSION_FAILED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export function badInput(message: string, details?: Record<string, unknown>): GatewayError {
  return new GatewayError(ErrorCodes.INVALID_REQUEST, message, 400, details);
}

export function serviceUnavailable(message: string, details?: Record<string, unknown>): GatewayError {
  return new GatewayError(ErrorCodes.SOAP_SERVICE_UNAVAILABLE, message, 503, details);
}

export function conversionFailure(message: string, details?: Record<string, unknown>): GatewayError {
  return new GatewayError(ErrorCodes.CONVERSION_FAILED, message, 500, details);
}
