// src/routes/attendance.routes.ts
import { Router } from 'express';
import * as checkInController from '@/controllers/checkin.controller';
import { authorize } from '@/middlewares/auth.middleware';
import { Role } from '@/models/auth.types';
// authenticate is applied in src/routes/index.ts

/**
 * @swagger
 * tags:
 *   name: Attendance
 *   description: Student check-in and attendance history
 */

/**
 * @swagger
 * components:
 *   schemas:
 *     CheckInRequest:
 *       type: object
 *       required:
 *         - deviceIdentifier
 *         - sessionId
 *       properties:
 *         deviceIdentifier:
 *           type: string
 *           example: AA:BB:CC:DD:EE:FF
 *         sessionId:
 *           type: integer
 *           minimum: 1
 *           example: 1
 *     CheckInResult:
 *       type: object
 *       properties:
 *         protocolVersion:
 *           type: integer
 *           example: 1
 *         outcome:
 *           type: string
 *           enum: [ACCEPTED, ALREADY_RECORDED, OFF_NETWORK, SESSION_NOT_FOUND]
 *         student:
 *           type: string
 *         classroomSegment:
 *           type: string
 *         checkedInAt:
 *           type: string
 *           format: date-time
 *         originalCheckedInAt:
 *           type: string
 *           format: date-time
 *         message:
 *           type: string
 *     AttendanceRecord:
 *       type: object
 *       properties:
 *         id:
 *           type: string
 *         studentId:
 *           type: string
 *         sessionId:
 *           type: integer
 *         deviceIdentifier:
 *           type: string
 *         networkAddress:
 *           type: string
 *         checkedInAt:
 *           type: string
 *           format: date-time
 */

const router = Router();

/**
 * @swagger
 * /attendance/check-in:
 *   post:
 *     summary: Check in to a session from the classroom network
 *     tags: [Attendance]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/CheckInRequest'
 *     responses:
 *       201:
 *         description: Check-in accepted
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/CheckInResult'
 *       200:
 *         description: Already checked in; carries the original timestamp
 *       400:
 *         description: Malformed device identifier or session id
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Fault'
 *       403:
 *         description: Device is not on the session's classroom network
 *       404:
 *         description: Session does not exist or is no longer open
 *       503:
 *         description: A dependency is unavailable; try again
 */
router.post('/check-in', authorize(Role.STUDENT), checkInController.checkIn);

/**
 * @swagger
 * /attendance/me:
 *   get:
 *     summary: List the caller's attendance records, newest first
 *     tags: [Attendance]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Attendance history
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items:
 *                 $ref: '#/components/schemas/AttendanceRecord'
 */
router.get('/me', authorize(Role.STUDENT), checkInController.getMyAttendance);

/**
 * @swagger
 * /attendance/sessions/{sessionId}:
 *   get:
 *     summary: List check-ins for a session
 *     tags: [Attendance]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: sessionId
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: Check-ins in arrival order
 *       404:
 *         description: Session not found
 */
router.get('/sessions/:sessionId', authorize(Role.INSTRUCTOR, Role.ADMIN), checkInController.getSessionAttendance);

export default router;
