import { Router } from 'express';
import { ConversionController } from '../controllers/conversion.controller.js';
import type { ConversionGateway } from '../services/conversion.service.js';

export function createConversionRouter(gateway: ConversionGateway): Router {
  const router = Router();
  const controller = new ConversionController(gateway);

  router.get('/', controller.root.bind(controller));
  router.get('/health', controller.health.bind(controller));

  router.post('/convert/ftc', controller.fahrenheitToCelsius.bind(controller));
  router.get('/convert/ftc', controller.fahrenheitToCelsius.bind(controller));
  router.post('/convert/ctf', controller.celsiusToFahrenheit.bind(controller));
  router.get('/convert/ctf', controller.celsiusToFahrenheit.bind(controller));
  router.post('/convert/batch', controller.batch.bind(controller));

  return router;
}
