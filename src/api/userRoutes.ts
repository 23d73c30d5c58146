import { Router } from 'express';
import { z } from 'zod';
import { DispatchCoordinator } from '../services/DispatchCoordinator';
import { NotFoundError } from '../utils/errors';
import { locationSchema, ratingSchema } from './schemas';

// Validation schemas
const createRiderSchema = z.object({
  id: z.string().trim().min(1).max(64),
  name: z.string().min(1).max(255),
  phone: z.string().min(10).max(20),
  defaultPickup: locationSchema.optional(),
  rating: ratingSchema.optional()
});

const rateRiderSchema = z.object({
  rating: ratingSchema
});

export function createRiderRouter(coordinator: DispatchCoordinator): Router {
  const router = Router();

  /**
   * @swagger
   * /api/riders:
   *   post:
   *     summary: Register a rider
   *     tags: [Riders]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - id
   *               - name
   *               - phone
   *             properties:
   *               id:
   *                 type: string
   *                 example: R001
   *               name:
   *                 type: string
   *                 example: Asha Rao
   *               phone:
   *                 type: string
   *                 example: +910000000001
   *               defaultPickup:
   *                 $ref: '#/components/schemas/Location'
   *               rating:
   *                 type: number
   *                 minimum: 0
   *                 maximum: 5
   *     responses:
   *       201:
   *         description: Rider registered
   *       400:
   *         description: Invalid input or rider id already registered
   */
  router.post('/', (req, res, next) => {
    try {
      const data = createRiderSchema.parse(req.body);
      const rider = coordinator.registerRider(data);

      res.status(201).json({
        success: true,
        data: rider
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/riders/{riderId}:
   *   get:
   *     summary: Get a rider
   *     tags: [Riders]
   *     parameters:
   *       - in: path
   *         name: riderId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Rider found
   *       404:
   *         description: Rider not found
   */
  router.get('/:riderId', (req, res, next) => {
    try {
      const rider = coordinator.getRider(req.params.riderId);
      if (!rider) {
        throw new NotFoundError('Rider', req.params.riderId);
      }

      res.json({
        success: true,
        data: rider
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/riders/{riderId}/rating:
   *   patch:
   *     summary: Update a rider's rating
   *     tags: [Riders]
   *     parameters:
   *       - in: path
   *         name: riderId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [rating]
   *             properties:
   *               rating:
   *                 type: number
   *     responses:
   *       200:
   *         description: Rating updated
   *       404:
   *         description: Rider not found
   */
  router.patch('/:riderId/rating', (req, res, next) => {
    try {
      const { rating } = rateRiderSchema.parse(req.body);
      const rider = coordinator.rateRider(req.params.riderId, rating);

      res.json({
        success: true,
        data: rider
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
