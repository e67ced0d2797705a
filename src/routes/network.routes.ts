// src/routes/network.routes.ts
import { Router } from 'express';
import * as networkController from '@/controllers/network.controller';

/**
 * @swagger
 * tags:
 *   name: Network
 *   description: Device attachment table fed by classroom routers
 */

const router = Router();

/**
 * @swagger
 * /network/attachments:
 *   post:
 *     summary: Push the router's current device associations
 *     tags: [Network]
 *     security:
 *       - routerKey: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - attachments
 *             properties:
 *               attachments:
 *                 type: array
 *                 items:
 *                   type: object
 *                   properties:
 *                     deviceIdentifier:
 *                       type: string
 *                       example: AA:BB:CC:DD:EE:FF
 *                     networkAddress:
 *                       type: string
 *                       example: 10.0.5.23
 *     responses:
 *       200:
 *         description: Number of saved and skipped entries
 *       401:
 *         description: Missing or wrong router key
 */
router.post('/attachments', networkController.pushAttachments);

/**
 * @swagger
 * /network/attachments/{deviceIdentifier}:
 *   delete:
 *     summary: Mark a device as detached
 *     tags: [Network]
 *     security:
 *       - routerKey: []
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
 *         description: No attachment known for the device
 */
router.delete('/attachments/:deviceIdentifier', networkController.removeAttachment);

export default router;
