import { TemperatureConstants } from '../../../../shared/config/index.js';
import {
  GatewayError,
  badInput,
  conversionFailure,
  oppositeUnit,
  type TemperatureUnit,
  type ConversionResult,
  type BatchConversionResult,
  type HealthStatus,
} from '../../../../shared/types/conversion.types.js';
import { createLogger, getErrorMessage, type Logger } from '../../../../shared/utils/index.js';
import type { TemperatureSoapClient } from '../clients/soap.client.js';

export interface ConversionGatewayOptions {
  /** Largest accepted batch; 0 or less accepts any size */
  batchMaxItems: number;
  logger?: Logger;
}

/**
 * Render a successful batch line, e.g. `25°C = 77°F`.
 */
export function formatConversionLine(result: ConversionResult): string {
  const from = TemperatureConstants.SYMBOLS[result.from_unit];
  const to = TemperatureConstants.SYMBOLS[result.to_unit];
  return `${result.original}${from} = ${result.converted}${to}`;
}

/**
 * Render the marker for a batch item that could not be converted. Never
 * contains ` = `, so it cannot be mistaken for a success line.
 */
export function formatErrorMarker(value: string, message: string): string {
  return `Error converting ${value}: ${message.replace(/ = /g, ' : ')}`;
}

export class ConversionGateway {
  private client: TemperatureSoapClient;
  private batchMaxItems: number;
  private logger: Logger;

  constructor(client: TemperatureSoapClient, options: ConversionGatewayOptions) {
    this.client = client;
    this.batchMaxItems = options.batchMaxItems;
    this.logger = options.logger ?? createLogger('temperature-gateway:service');
  }

  async fahrenheitToCelsius(value: string): Promise<ConversionResult> {
    return this.convert(value, 'fahrenheit');
  }

  async celsiusToFahrenheit(value: string): Promise<ConversionResult> {
    return this.convert(value, 'celsius');
  }

  async convert(value: string, fromUnit: TemperatureUnit): Promise<ConversionResult> {
    if (value.length === 0) {
      throw badInput('temperature is required');
    }

    let converted: string;
    try {
      converted = fromUnit === 'celsius'
        ? await this.client.celsiusToFahrenheit(value)
        : await this.client.fahrenheitToCelsius(value);
    } catch (error) {
      if (error instanceof GatewayError) throw error;
      this.logger.error('Unexpected error during SOAP call', error, { fromUnit });
      throw conversionFailure(`Conversion failed: ${getErrorMessage(error)}`);
    }

    return {
      original: value,
      converted,
      from_unit: fromUnit,
      to_unit: oppositeUnit(fromUnit),
    };
  }

  /**
   * Convert every value in order, one remote call at a time. A failing item is
   * recorded as an error marker; the batch itself only fails on bad input.
   */
  async convertBatch(values: string[], fromUnit: TemperatureUnit): Promise<BatchConversionResult> {
    if (values.length === 0) {
      throw badInput('No temperatures provided');
    }
    if (this.batchMaxItems > 0 && values.length > this.batchMaxItems) {
      throw badInput(`At most ${this.batchMaxItems} temperatures may be converted per batch`, {
        received: values.length,
      });
    }

    const results: string[] = [];
    let totalConverted = 0;
    let totalErrors = 0;

    for (const value of values) {
      try {
        const result = await this.convert(value, fromUnit);
        results.push(formatConversionLine(result));
        totalConverted++;
      } catch (error) {
        this.logger.warn('Batch item failed', { value, fromUnit, error: getErrorMessage(error) });
        results.push(formatErrorMarker(value, getErrorMessage(error)));
        totalErrors++;
      }
    }

    this.logger.info('Batch conversion complete', {
      fromUnit,
      totalConverted,
      totalErrors,
    });

    return {
      results,
      total_converted: totalConverted,
      total_errors: totalErrors,
    };
  }

  async getHealth(): Promise<HealthStatus> {
    let available = false;
    try {
      available = await this.client.ping();
    } catch (error) {
      this.logger.warn('SOAP service health check failed', { error: getErrorMessage(error) });
    }

    return {
      status: available ? 'healthy' : 'degraded',
      soap_service_available: available,
      version: TemperatureConstants.API_VERSION,
    };
  }
}
