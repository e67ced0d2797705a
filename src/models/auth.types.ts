// src/models/auth.types.ts
import { z } from 'zod';

export const Role = {
    STUDENT: 'STUDENT',
    INSTRUCTOR: 'INSTRUCTOR',
    ADMIN: 'ADMIN',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export const jwtPayloadSchema = z.object({
    id: z.string().min(1),
    role: z.enum([Role.STUDENT, Role.INSTRUCTOR, Role.ADMIN]),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;
