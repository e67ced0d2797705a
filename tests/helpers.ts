import { generateToken } from '@/lib/auth.utils';
import { Role } from '@/models/auth.types';

export const ROUTER_KEY = 'test-router-key';

export const tokenFor = (id: string, role: Role): string => generateToken({ id, role });

export const bearer = (id: string, role: Role): string => `Bearer ${tokenFor(id, role)}`;
