import { Request, Response, NextFunction } from 'express';
import { config } from '@/config/env';
import { keysMatch, verifyToken } from '@/lib/auth.utils';
import { Role } from '@/models/auth.types';

// Extend Express Request type to include user
declare global {
  namespace Express {
    interface Request {
      user?: {
        id: string;
        role: Role;
      };
    }
  }
}

export const authenticate = (req: Request, res: Response, next: NextFunction) => {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return res.status(401).json({ message: 'No token provided.' });
  }

  const token = authHeader.slice('Bearer '.length).trim();
  const decoded = verifyToken(token);
  if (!decoded) {
    return res.status(401).json({ message: 'Invalid or expired token' });
  }

  req.user = { id: decoded.id, role: decoded.role };
  next();
};

// Role-based authorization middleware
export const authorize = (...allowedRoles: Role[]) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) {
      return res.status(401).json({ message: 'Authentication required.' });
    }

    if (!allowedRoles.includes(req.user.role)) {
      return res.status(403).json({ message: 'Access denied. Insufficient permissions.' });
    }

    next();
  };
};

// Classroom routers authenticate with a shared key instead of a user token.
export const requireRouterKey = (req: Request, res: Response, next: NextFunction) => {
  if (!config.routerApiKey) {
    return res.status(503).json({ message: 'Router ingestion is not configured.' });
  }

  const provided = req.header('x-router-key');
  if (!provided || !keysMatch(provided, config.routerApiKey)) {
    return res.status(401).json({ message: 'Invalid router key.' });
  }

  next();
};
