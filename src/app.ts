import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import routes from './routes';
import { swaggerSpec } from './swagger/swagger.config';
import { CORS_ORIGINS, env } from './config/environment';
import { logger } from './config/logger';

const SWAGGER_UI_VERSION = '5.11.0';

/**
 * Creates and configures the Express application
 */
export function createApp(): Application {
  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for Swagger UI
  }));

  app.use(cors({ origin: CORS_ORIGINS }));

  // Body parsing middleware
  app.use(express.json({ limit: env.REQUEST_BODY_LIMIT }));

  // Request logging middleware
  app.use(requestLogger);

  // API Documentation - Swagger UI served from CDN
  app.get('/docs', (_req, res) => {
    const html = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Bouquet Allocation API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui.css">
  <style>
    body { margin: 0; padding: 0; }
    .swagger-ui .topbar { display: none; }
  </style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui-bundle.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({
        url: '/openapi.json',
        dom_id: '#swagger-ui',
        deepLinking: true,
        displayRequestDuration: true,
        tryItOutEnabled: true
      });
    };
  </script>
</body>
</html>`;
    res.send(html);
  });

  app.get('/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  // Mount API routes
  app.use('/', routes);

  // 404 handler
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.debug('Express application configured');

  return app;
}
