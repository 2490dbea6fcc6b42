import { Router } from 'express';
import { AllocationController } from '../../controllers/allocation.controller';
import { AllocationService } from '../../services/allocation.service';
import { validate } from '../../middleware/validation.middleware';
import {
  createAllocationSchema,
  createTextAllocationSchema,
} from '../../validators/allocation.validator';

/**
 * Allocation routes (v1)
 */
const router = Router();

// Initialize dependencies
const allocationService = new AllocationService();
const allocationController = new AllocationController(allocationService);

/**
 * @swagger
 * /v1/allocations:
 *   post:
 *     summary: Allocate flower stock to bouquet designs
 *     tags: [Allocations]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - designs
 *               - stock
 *             properties:
 *               designs:
 *                 type: array
 *                 items:
 *                   $ref: '#/components/schemas/DesignRecord'
 *               stock:
 *                 type: array
 *                 items:
 *                   $ref: '#/components/schemas/StockRecord'
 *     responses:
 *       200:
 *         description: Allocation report
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AllocationReport'
 *       400:
 *         description: Validation error
 */
router.post('/', validate(createAllocationSchema), allocationController.createAllocation);

/**
 * @swagger
 * /v1/allocations/text:
 *   post:
 *     summary: Allocate from text records
 *     description: Designs like AL10a15b5c30, one flower per line like aL
 *     tags: [Allocations]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - designs
 *               - flowers
 *             properties:
 *               designs:
 *                 type: array
 *                 items:
 *                   type: string
 *                   example: AL10a15b5c30
 *               flowers:
 *                 type: array
 *                 items:
 *                   type: string
 *                   example: aL
 *     responses:
 *       200:
 *         description: Allocation report
 *       400:
 *         description: Invalid design or flower record
 */
router.post('/text', validate(createTextAllocationSchema), allocationController.createTextAllocation);

/**
 * @swagger
 * /v1/allocations/sample:
 *   get:
 *     summary: Run the bundled sample data set
 *     tags: [Allocations]
 *     responses:
 *       200:
 *         description: Allocation report
 */
router.get('/sample', allocationController.getSampleAllocation);

export default router;
