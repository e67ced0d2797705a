// src/routes/index.ts
import { Router, Request, Response } from 'express';
import attendanceRoutes from './attendance.routes';
import sessionRoutes from './session.routes';
import networkRoutes from './network.routes';
import deviceRoutes from './device.routes';
import { authenticate, authorize, requireRouterKey } from '@/middlewares/auth.middleware';
import { Role } from '@/models/auth.types';
import { config } from '@/config/env';

const router = Router();

// Health check route - Admin Only
router.get(
  '/health',
  authenticate,
  authorize(Role.ADMIN),
  (req: Request, res: Response) => {
    res.status(200).json({
      status: 'UP',
      message: 'Health check successful (Admin Access)',
      storage: config.storageDriver,
      timestamp: new Date().toISOString(),
    });
  }
);

// Student check-in and history; role checks live on the individual routes
router.use('/attendance', authenticate, attendanceRoutes);

// Scheduling collaborator
router.use(
  '/sessions',
  authenticate,
  authorize(Role.INSTRUCTOR, Role.ADMIN),
  sessionRoutes
);

// Device ownership, maintained by staff
router.use(
  '/devices',
  authenticate,
  authorize(Role.INSTRUCTOR, Role.ADMIN),
  deviceRoutes
);

// Network attachment collaborator (classroom routers, shared key)
router.use('/network', requireRouterKey, networkRoutes);

export default router;
