import { Router } from 'express';
import { z } from 'zod';
import { DispatchCoordinator } from '../services/DispatchCoordinator';
import { NotFoundError } from '../utils/errors';
import { driverAvailabilitySchema, locationSchema, ratingSchema, vehicleClassSchema } from './schemas';

// Validation schemas
const createDriverSchema = z.object({
  id: z.string().trim().min(1).max(64),
  name: z.string().min(1).max(255),
  phone: z.string().min(10).max(20),
  vehicle: z.object({
    vehicleId: z.string().min(1).max(64),
    vehicleClass: vehicleClassSchema,
    capacity: z.number().int().min(1).max(10),
    licensePlate: z.string().min(1).max(20),
    model: z.string().min(1).max(255)
  }),
  location: locationSchema,
  status: driverAvailabilitySchema.shape.status.optional(),
  rating: ratingSchema.optional()
});

const rateDriverSchema = z.object({
  rating: ratingSchema
});

export function createDriverRouter(coordinator: DispatchCoordinator): Router {
  const router = Router();

  /**
   * @swagger
   * /api/drivers:
   *   post:
   *     summary: Register a driver with their vehicle
   *     tags: [Drivers]
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
   *               - vehicle
   *               - location
   *             properties:
   *               id:
   *                 type: string
   *                 example: D001
   *               name:
   *                 type: string
   *                 example: Ravi Menon
   *               phone:
   *                 type: string
   *                 example: +910000000002
   *               vehicle:
   *                 type: object
   *                 properties:
   *                   vehicleId:
   *                     type: string
   *                   vehicleClass:
   *                     type: string
   *                     enum: [TWO_WHEELER, SEDAN, SUV, AUTO_RICKSHAW]
   *                   capacity:
   *                     type: integer
   *                     example: 4
   *                   licensePlate:
   *                     type: string
   *                   model:
   *                     type: string
   *               location:
   *                 $ref: '#/components/schemas/Location'
   *               status:
   *                 type: string
   *                 enum: [AVAILABLE, OFFLINE]
   *     responses:
   *       201:
   *         description: Driver registered
   *       400:
   *         description: Invalid input or driver id already registered
   */
  router.post('/', (req, res, next) => {
    try {
      const data = createDriverSchema.parse(req.body);
      const driver = coordinator.registerDriver(data);

      res.status(201).json({
        success: true,
        data: driver
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/drivers:
   *   get:
   *     summary: List drivers currently available for solo rides
   *     tags: [Drivers]
   *     responses:
   *       200:
   *         description: Available drivers
   */
  router.get('/', (req, res) => {
    res.json({
      success: true,
      data: coordinator.getAvailableDrivers()
    });
  });

  /**
   * @swagger
   * /api/drivers/{driverId}:
   *   get:
   *     summary: Get a driver with carpool occupancy
   *     tags: [Drivers]
   *     parameters:
   *       - in: path
   *         name: driverId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Driver found
   *       404:
   *         description: Driver not found
   */
  router.get('/:driverId', (req, res, next) => {
    try {
      const { driverId } = req.params;
      const driver = coordinator.getDriver(driverId);
      if (!driver) {
        throw new NotFoundError('Driver', driverId);
      }

      res.json({
        success: true,
        data: { ...driver, carpoolRideIds: coordinator.getCarpoolMembers(driverId) }
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/drivers/{driverId}/location:
   *   patch:
   *     summary: Report a driver's current location
   *     tags: [Drivers]
   *     parameters:
   *       - in: path
   *         name: driverId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/Location'
   *     responses:
   *       200:
   *         description: Location updated
   *       404:
   *         description: Driver not found
   */
  router.patch('/:driverId/location', (req, res, next) => {
    try {
      const location = locationSchema.parse(req.body);
      const driver = coordinator.updateDriverLocation(req.params.driverId, location);

      res.json({
        success: true,
        data: driver
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/drivers/{driverId}/status:
   *   patch:
   *     summary: Take a driver online or offline
   *     tags: [Drivers]
   *     parameters:
   *       - in: path
   *         name: driverId
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
   *                 enum: [AVAILABLE, OFFLINE]
   *     responses:
   *       200:
   *         description: Status changed
   *       400:
   *         description: Driver has active rides
   */
  router.patch('/:driverId/status', (req, res, next) => {
    try {
      const { status } = driverAvailabilitySchema.parse(req.body);
      const driver = coordinator.setDriverAvailability(req.params.driverId, status);

      res.json({
        success: true,
        data: driver
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/drivers/{driverId}/rating:
   *   patch:
   *     summary: Update a driver's rating
   *     tags: [Drivers]
   *     parameters:
   *       - in: path
   *         name: driverId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Rating updated
   */
  router.patch('/:driverId/rating', (req, res, next) => {
    try {
      const { rating } = rateDriverSchema.parse(req.body);
      const driver = coordinator.rateDriver(req.params.driverId, rating);

      res.json({
        success: true,
        data: driver
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
