// Load and validate environment variables first
import { config } from '@/config/env';

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import mainRouter from '@/routes/index';
import { errorHandler } from '@/middlewares/errorHandler';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from './config/swagger';

const app: Express = express();

// Behind the campus proxy; keeps req.ip meaningful in logs
app.set('trust proxy', config.nodeEnv === 'production');

// Middlewares
app.use(cors());
app.use(express.json()); // For parsing application/json

// Swagger UI route
app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
  swaggerOptions: {
    persistAuthorization: true,
  },
  customCss: '.swagger-ui .topbar { display: none }',
  customSiteTitle: 'Wi-Fi Attendance API Documentation'
}));

// Routes
app.use('/api', mainRouter); // Prefix all routes with /api

// Not found handler (should be after all routes)
// eslint-disable-next-line @typescript-eslint/no-unused-vars
app.use((req: Request, res: Response, next: NextFunction) => {
  res.status(404).json({ message: 'Resource not found' });
});

// Global error handler (should be the last middleware)
app.use(errorHandler);

export { app };
