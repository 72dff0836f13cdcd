import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { TemperatureConstants } from '../../../../shared/config/index.js';
import {
  badInput,
  TEMPERATURE_UNITS,
  type ServiceSummary,
  type TemperatureUnit,
} from '../../../../shared/types/conversion.types.js';
import type { ConversionGateway } from '../services/conversion.service.js';

const TemperatureSchema = z.object({
  temperature: z
    .string({
      required_error: 'temperature is required',
      invalid_type_error: 'temperature must be a string',
    })
    .min(1, 'temperature is required'),
});

const BatchConversionSchema = z.object({
  temperatures: z
    .array(z.string({ invalid_type_error: 'temperatures must contain only strings' }), {
      required_error: 'temperatures is required',
      invalid_type_error: 'temperatures must be an array of strings',
    })
    .min(1, 'No temperatures provided'),
  from_unit: z
    .string({ required_error: 'from_unit is required' })
    .transform(value => value.toLowerCase())
    .pipe(z.enum(TEMPERATURE_UNITS, {
      errorMap: () => ({ message: "from_unit must be 'celsius' or 'fahrenheit'" }),
    })),
});

function describeIssues(error: z.ZodError): string {
  return error.errors.map(e => e.message).join('; ');
}

export class ConversionController {
  private gateway: ConversionGateway;

  constructor(gateway: ConversionGateway) {
    this.gateway = gateway;
  }

  root(req: Request, res: Response) {
    const summary: ServiceSummary = {
      message: 'Temperature Conversion API',
      description: 'REST API wrapper for a SOAP temperature conversion service',
      version: TemperatureConstants.API_VERSION,
      endpoints: {
        health: '/health',
        fahrenheit_to_celsius: '/convert/ftc',
        celsius_to_fahrenheit: '/convert/ctf',
        batch_conversion: '/convert/batch',
      },
    };
    res.json(summary);
  }

  async health(req: Request, res: Response, next: NextFunction) {
    try {
      res.json(await this.gateway.getHealth());
    } catch (error) { next(error); }
  }

  async fahrenheitToCelsius(req: Request, res: Response, next: NextFunction) {
    await this.single(req, res, next, 'fahrenheit');
  }

  async celsiusToFahrenheit(req: Request, res: Response, next: NextFunction) {
    await this.single(req, res, next, 'celsius');
  }

  async batch(req: Request, res: Response, next: NextFunction) {
    try {
      const validation = BatchConversionSchema.safeParse(req.body ?? {});
      if (!validation.success) {
        throw badInput(describeIssues(validation.error));
      }
      const { temperatures, from_unit } = validation.data;
      res.json(await this.gateway.convertBatch(temperatures, from_unit));
    } catch (error) { next(error); }
  }

  private async single(req: Request, res: Response, next: NextFunction, fromUnit: TemperatureUnit) {
    try {
      // GET reads the query string, POST the JSON body
      const source: unknown = req.method === 'GET' ? req.query : req.body;
      const validation = TemperatureSchema.safeParse(source ?? {});
      if (!validation.success) {
        throw badInput(describeIssues(validation.error));
      }
      res.json(await this.gateway.convert(validation.data.temperature, fromUnit));
    } catch (error) { next(error); }
  }
}
