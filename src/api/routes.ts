import { Router } from 'express';
import { z } from 'zod';
import { DispatchCoordinator } from '../services/DispatchCoordinator';
import { RideStatus } from '../types';
import { NotFoundError } from '../utils/errors';
import { locationSchema, rideModeSchema, rideStatusSchema, vehicleClassSchema } from './schemas';

// Validation schemas
const createRequestSchema = z.object({
  riderId: z.string().min(1),
  pickup: locationSchema,
  dropoff: locationSchema,
  mode: rideModeSchema,
  vehicleClass: vehicleClassSchema
});

const updateStatusSchema = z.object({
  status: rideStatusSchema
});

const listQuerySchema = z.object({
  status: rideStatusSchema.optional(),
  riderId: z.string().min(1).optional()
});

export function createRideRouter(coordinator: DispatchCoordinator): Router {
  const router = Router();

  /**
   * @swagger
   * /api/rides/request:
   *   post:
   *     summary: Request a ride and try to assign a driver
   *     description: >
   *       A request that no driver takes still succeeds; the returned ride
   *       has no driver and stays REQUESTED.
   *     tags: [Rides]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - riderId
   *               - pickup
   *               - dropoff
   *               - mode
   *               - vehicleClass
   *             properties:
   *               riderId:
   *                 type: string
   *               pickup:
   *                 $ref: '#/components/schemas/Location'
   *               dropoff:
   *                 $ref: '#/components/schemas/Location'
   *               mode:
   *                 type: string
   *                 enum: [SOLO, SHARED]
   *               vehicleClass:
   *                 type: string
   *                 enum: [TWO_WHEELER, SEDAN, SUV, AUTO_RICKSHAW]
   *     responses:
   *       201:
   *         description: Ride admitted (with or without a driver)
   *       400:
   *         description: Invalid input, e.g. identical pickup and dropoff
   *       404:
   *         description: Rider not found
   */
  router.post('/request', (req, res, next) => {
    try {
      const data = createRequestSchema.parse(req.body);
      const rideId = coordinator.requestRide(
        data.riderId,
        data.pickup,
        data.dropoff,
        data.mode,
        data.vehicleClass
      );

      res.status(201).json({
        success: true,
        data: { rideId, ride: coordinator.getRide(rideId) }
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/rides:
   *   get:
   *     summary: List rides
   *     tags: [Rides]
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *       - in: query
   *         name: riderId
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Rides matching the filter
   */
  router.get('/', (req, res, next) => {
    try {
      const filter = listQuerySchema.parse(req.query);
      res.json({
        success: true,
        data: coordinator.listRides(filter)
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/rides/{rideId}:
   *   get:
   *     summary: Get a ride
   *     tags: [Rides]
   *     parameters:
   *       - in: path
   *         name: rideId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Ride found
   *       404:
   *         description: Ride not found
   */
  router.get('/:rideId', (req, res, next) => {
    try {
      const { rideId } = req.params;
      const ride = coordinator.getRide(rideId);
      if (!ride) {
        throw new NotFoundError('Ride', rideId);
      }

      res.json({
        success: true,
        data: ride
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/rides/{rideId}/status:
   *   put:
   *     summary: Move a ride to a new lifecycle status
   *     tags: [Rides]
   *     parameters:
   *       - in: path
   *         name: rideId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [status]
   *             properties:
   *               status:
   *                 type: string
   *                 enum: [DRIVER_ENROUTE, IN_PROGRESS, COMPLETED, CANCELLED]
   *     responses:
   *       200:
   *         description: Status updated
   *       400:
   *         description: Transition not allowed
   *       404:
   *         description: Ride not found
   */
  router.put('/:rideId/status', (req, res, next) => {
    try {
      const { status } = updateStatusSchema.parse(req.body);
      const ride = coordinator.updateRideStatus(req.params.rideId, status);

      res.json({
        success: true,
        data: ride
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/rides/{rideId}/start:
   *   post:
   *     summary: Start a ride (status IN_PROGRESS)
   *     tags: [Rides]
   *     parameters:
   *       - in: path
   *         name: rideId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Ride started successfully
   *       400:
   *         description: Cannot start ride
   */
  router.post('/:rideId/start', (req, res, next) => {
    try {
      const ride = coordinator.updateRideStatus(req.params.rideId, RideStatus.IN_PROGRESS);

      res.json({
        success: true,
        data: ride
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/rides/{rideId}/complete:
   *   post:
   *     summary: Complete a ride and settle its fare
   *     tags: [Rides]
   *     parameters:
   *       - in: path
   *         name: rideId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Ride completed and settled. Driver released.
   *       400:
   *         description: Cannot complete ride
   */
  router.post('/:rideId/complete', (req, res, next) => {
    try {
      const ride = coordinator.updateRideStatus(req.params.rideId, RideStatus.COMPLETED);

      res.json({
        success: true,
        data: ride
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/rides/{rideId}:
   *   delete:
   *     summary: Cancel a ride
   *     tags: [Rides]
   *     parameters:
   *       - in: path
   *         name: rideId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Ride cancelled successfully
   *       400:
   *         description: Ride already finished
   */
  router.delete('/:rideId', (req, res, next) => {
    try {
      const ride = coordinator.updateRideStatus(req.params.rideId, RideStatus.CANCELLED);

      res.json({
        success: true,
        data: ride
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
