// src/routes/device.routes.ts
import { Router } from 'express';
import * as deviceController from '@/controllers/device.controller';
// Middlewares (authenticate, authorize) will be applied in src/routes/index.ts

/**
 * @swagger
 * tags:
 *   name: Devices
 *   description: Which student owns which device
 */

/**
 * @swagger
 * components:
 *   schemas:
 *     DeviceRegistration:
 *       type: object
 *       properties:
 *         deviceIdentifier:
 *           type: string
 *           example: AA:BB:CC:DD:EE:FF
 *         studentId:
 *           type: string
 *         registeredAt:
 *           type: string
 *           format: date-time
 */

const router = Router();

/**
 * @swagger
 * /devices:
 *   get:
 *     summary: List registered devices
 *     tags: [Devices]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: query
 *         name: studentId
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Registrations ordered by device identifier
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items:
 *                 $ref: '#/components/schemas/DeviceRegistration'
 */
router.get('/', deviceController.listDevices);

/**
 * @swagger
 * /devices/{deviceIdentifier}:
 *   put:
 *     summary: Register a device to a student, replacing any previous owner
 *     tags: [Devices]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: deviceIdentifier
 *         required: true
 *         schema:
 *           type: string
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - studentId
 *             properties:
 *               studentId:
 *                 type: string
 *     responses:
 *       200:
 *         description: The stored registration
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/DeviceRegistration'
 *       400:
 *         description: Malformed device identifier or missing studentId
 *   delete:
 *     summary: Remove a device registration
 *     tags: [Devices]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: deviceIdentifier
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       204:
 *         description: Removed
 *       404:
 *         description: The device is not registered
 */
router.put('/:deviceIdentifier', deviceController.registerDevice);
router.delete('/:deviceIdentifier', deviceController.unregisterDevice);

export default router;
