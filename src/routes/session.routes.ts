// src/routes/session.routes.ts
import { Router } from 'express';
import * as sessionController from '@/controllers/session.controller';
// Middlewares (authenticate, authorize) will be applied in src/routes/index.ts

/**
 * @swagger
 * tags:
 *   name: Sessions
 *   description: Scheduling of attendance sessions
 */

/**
 * @swagger
 * components:
 *   schemas:
 *     Session:
 *       type: object
 *       properties:
 *         id:
 *           type: integer
 *           readOnly: true
 *         classroomSegment:
 *           type: string
 *           example: 10.0.5.
 *         label:
 *           type: string
 *           nullable: true
 *         status:
 *           type: string
 *           enum: [OPEN, CLOSED]
 *         acceptingCheckIns:
 *           type: boolean
 *         startsAt:
 *           type: string
 *           format: date-time
 *           nullable: true
 *         endsAt:
 *           type: string
 *           format: date-time
 *           nullable: true
 *     SessionCreate:
 *       type: object
 *       required:
 *         - classroomSegment
 *       properties:
 *         classroomSegment:
 *           type: string
 *         label:
 *           type: string
 *         startsAt:
 *           type: string
 *           format: date-time
 *         endsAt:
 *           type: string
 *           format: date-time
 */

const router = Router();

/**
 * @swagger
 * /sessions:
 *   post:
 *     summary: Open a new attendance session on a classroom segment
 *     tags: [Sessions]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/SessionCreate'
 *     responses:
 *       201:
 *         description: Session created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Session'
 *       400:
 *         description: Invalid request data
 *   get:
 *     summary: List sessions
 *     tags: [Sessions]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: query
 *         name: status
 *         schema:
 *           type: string
 *           enum: [OPEN, CLOSED]
 *     responses:
 *       200:
 *         description: Sessions ordered by id
 */
router.post('/', sessionController.createSession);
router.get('/', sessionController.listSessions);

/**
 * @swagger
 * /sessions/{sessionId}:
 *   get:
 *     summary: Get a session
 *     tags: [Sessions]
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
 *         description: The session
 *       404:
 *         description: Session not found
 */
router.get('/:sessionId', sessionController.getSession);

/**
 * @swagger
 * /sessions/{sessionId}/close:
 *   patch:
 *     summary: Close a session; later check-ins are rejected as not found
 *     tags: [Sessions]
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
 *         description: The closed session
 *       404:
 *         description: Session not found
 */
router.patch('/:sessionId/close', sessionController.closeSession);

export default router;
