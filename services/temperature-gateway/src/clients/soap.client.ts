/**
 * Temperature Conversion SOAP Client
 * Binds to the remote WSDL and invokes its two conversion operations
 */

import CircuitBreaker from 'opossum';
import { TemperatureConstants, type SoapConfig } from '../../../../shared/config/index.js';
import {
  GatewayError,
  serviceUnavailable,
  conversionFailure,
} from '../../../../shared/types/conversion.types.js';
import { createLogger, getErrorMessage, type Logger } from '../../../../shared/utils/index.js';
import {
  parseWSDL,
  buildSOAPRequest,
  parseSOAPResponse,
  soapActionFor,
  type SOAPResponse,
  type WSDLDescription,
} from '../utils/soap.utils.js';

const UNAVAILABLE_STATUSES = new Set([502, 503, 504]);

/**
 * The two remote operations the gateway depends on.
 */
export interface TemperatureSoapClient {
  fahrenheitToCelsius(fahrenheit: string): Promise<string>;
  celsiusToFahrenheit(celsius: string): Promise<string>;
  /** Lightweight reachability check against the description endpoint. Never throws. */
  ping(): Promise<boolean>;
}

interface SoapBinding {
  namespace: string;
  endpoint: string;
}

interface EnvelopeCall {
  operation: string;
  endpoint: string;
  soapAction: string;
  envelope: string;
}

interface EnvelopeReply {
  status: number;
  body: string;
}

interface ParsedReply {
  status: number;
  response: SOAPResponse;
}

export class WSDLTemperatureClient implements TemperatureSoapClient {
  private wsdlUrl: string;
  private endpointOverride?: string;
  private timeout: number;
  private logger: Logger;
  private binding: Promise<SoapBinding> | null = null;
  private breaker: CircuitBreaker<[EnvelopeCall], ParsedReply> | null = null;

  constructor(options: SoapConfig, logger: Logger = createLogger('temperature-gateway:soap-client')) {
    this.wsdlUrl = options.wsdlUrl;
    this.endpointOverride = options.endpointUrl;
    this.timeout = options.timeout;
    this.logger = logger;

    if (options.circuitBreaker) {
      this.breaker = new CircuitBreaker((call: EnvelopeCall) => this.postEnvelope(call), {
        // postEnvelope enforces the timeout itself and aborts the request
        timeout: false,
      });
      this.breaker.on('open', () => this.logger.warn('SOAP circuit opened', { wsdlUrl: this.wsdlUrl }));
      this.breaker.on('close', () => this.logger.info('SOAP circuit closed', { wsdlUrl: this.wsdlUrl }));
    }
  }

  async fahrenheitToCelsius(fahrenheit: string): Promise<string> {
    const { name, argument } = TemperatureConstants.OPERATIONS.fahrenheit;
    return this.invoke(name, argument, fahrenheit);
  }

  async celsiusToFahrenheit(celsius: string): Promise<string> {
    const { name, argument } = TemperatureConstants.OPERATIONS.celsius;
    return this.invoke(name, argument, celsius);
  }

  /**
   * Fetch and validate the WSDL. Concurrent callers share one load; a failed
   * load is forgotten so that the next request starts a fresh one.
   */
  async initialize(): Promise<void> {
    await this.getBinding();
  }

  async ping(): Promise<boolean> {
    try {
      const response = await this.request(this.wsdlUrl, { method: 'GET' });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      this.logger.warn('SOAP service health check failed', { error: getErrorMessage(error) });
      return false;
    }
  }

  private getBinding(): Promise<SoapBinding> {
    if (!this.binding) {
      this.binding = this.loadBinding().catch((error: unknown) => {
        this.binding = null;
        throw error;
      });
    }
    return this.binding;
  }

  private async loadBinding(): Promise<SoapBinding> {
    let description: WSDLDescription;
    try {
      const response = await this.request(this.wsdlUrl, { method: 'GET' });
      if (response.status < 200 || response.status >= 300) {
        throw new Error(`WSDL request returned HTTP ${response.status}`);
      }
      description = await parseWSDL(response.body);
    } catch (error) {
      this.logger.error('Failed to initialize SOAP client', error, { wsdlUrl: this.wsdlUrl });
      throw serviceUnavailable('SOAP service not available', { reason: getErrorMessage(error) });
    }

    const required = Object.values(TemperatureConstants.OPERATIONS).map(op => op.name);
    const missing = required.filter(name => !description.operations.includes(name));
    if (missing.length > 0) {
      throw serviceUnavailable('SOAP service not available', {
        reason: `WSDL does not describe ${missing.join(', ')}`,
      });
    }

    const endpoint = this.endpointOverride || description.endpoint;
    if (!endpoint) {
      throw serviceUnavailable('SOAP service not available', { reason: 'WSDL does not declare an endpoint' });
    }

    this.logger.info('SOAP client initialized successfully', { endpoint });
    return { namespace: description.targetNamespace, endpoint };
  }

  private async invoke(operation: string, argument: string, value: string): Promise<string> {
    const { namespace, endpoint } = await this.getBinding();
    const call: EnvelopeCall = {
      operation,
      endpoint,
      soapAction: soapActionFor(namespace, operation),
      envelope: buildSOAPRequest(operation, argument, value, namespace),
    };

    this.logger.debug('SOAP call', { operation, value });
    const { status, response } = this.breaker
      ? await this.fireBreaker(this.breaker, call)
      : await this.postEnvelope(call);

    switch (response.kind) {
      case 'result':
        if (status < 200 || status >= 300) {
          throw conversionFailure(`Conversion failed: remote returned HTTP ${status}`);
        }
        return response.value;
      case 'fault':
        throw conversionFailure(`Conversion failed: ${response.faultString}`, { faultCode: response.faultCode });
      case 'malformed':
        throw conversionFailure(`Conversion failed: ${response.reason}`, { status });
    }
  }

  private async fireBreaker(
    breaker: CircuitBreaker<[EnvelopeCall], ParsedReply>,
    call: EnvelopeCall,
  ): Promise<ParsedReply> {
    try {
      return await breaker.fire(call);
    } catch (error) {
      if (error instanceof GatewayError) throw error;
      // opossum's own rejections (open circuit)
      throw serviceUnavailable('SOAP service not available', { reason: getErrorMessage(error) });
    }
  }

  /**
   * Rejects with ServiceUnavailable when the endpoint cannot be reached or
   * answers 502/503/504 without a SOAP fault, so that the circuit breaker
   * counts both. Every other reply is handed back parsed.
   */
  private async postEnvelope(call: EnvelopeCall): Promise<ParsedReply> {
    let reply: EnvelopeReply;
    try {
      reply = await this.request(call.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/xml; charset=utf-8',
          SOAPAction: call.soapAction,
        },
        body: call.envelope,
      });
    } catch (error) {
      this.logger.error('SOAP endpoint unreachable', error, { endpoint: call.endpoint });
      throw serviceUnavailable('SOAP service not available', { reason: getErrorMessage(error) });
    }

    const response = await parseSOAPResponse(call.operation, reply.body);
    if (response.kind === 'malformed' && UNAVAILABLE_STATUSES.has(reply.status)) {
      this.logger.warn('SOAP endpoint answered with a gateway error', { endpoint: call.endpoint, status: reply.status });
      throw serviceUnavailable(`SOAP service not available (HTTP ${reply.status})`);
    }
    return { status: reply.status, response };
  }

  private async request(url: string, init: RequestInit): Promise<EnvelopeReply> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Request to ${url} timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
