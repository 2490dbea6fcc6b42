import { Router } from 'express';
import allocationsRoutes from './v1/allocations.routes';
import { HealthCheckResponse } from '../types/api.types';

/**
 * API Routes Aggregator
 */
const router = Router();

// v1 routes
router.use('/v1/allocations', allocationsRoutes);

// Health check endpoint
router.get('/health', (_req, res) => {
  const health: HealthCheckResponse = {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  };
  res.status(200).json(health);
});

// API version info
router.get('/v1', (_req, res) => {
  res.status(200).json({
    version: '1.0.0',
    api: 'Bouquet Allocation API',
  });
});

export default router;
