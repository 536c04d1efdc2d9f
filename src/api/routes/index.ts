import express, { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerDocument } from '../swagger';
import { createUpload } from '../middleware';
import { Services } from '../../services';
import { AppConfig } from '../../config/app-config';
import { createActivitiesRouter } from './activities';

export const createRouter = (services: Services, config: AppConfig): Router => {
  const router = express.Router();
  const upload = createUpload(config.maxUploadBytes);

  // Swagger documentation route
  router.use('/api-docs', swaggerUi.serve);
  router.get('/api-docs', swaggerUi.setup(swaggerDocument, {
    swaggerOptions: {
      displayRequestDuration: true,
      docExpansion: 'list',
      filter: true
    }
  }));

  router.get('/swagger.json', (_req, res) => {
    res.json(swaggerDocument);
  });

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0'
    });
  });

  router.use('/activities', createActivitiesRouter(services, upload.single('file')));

  // Browser front-end entry page
  router.get('/', (_req, res) => {
    res.redirect(307, '/static/index.html');
  });

  return router;
};
