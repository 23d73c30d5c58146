import { Router } from 'express';
import { z } from 'zod';
import { DispatchCoordinator } from '../services/DispatchCoordinator';
import { RecentEventsObserver } from '../services/observers';
import { MATCHING_POLICY_NAMES, createMatchingPolicy } from '../algorithms/matching';
import { buildFarePipeline } from '../algorithms/pricing';

const matchingPolicySchema = z.object({
  policy: z.enum(MATCHING_POLICY_NAMES)
});

// bounds are checked when the stages are built
const farePipelineSchema = z.object({
  modifiers: z
    .array(
      z.discriminatedUnion('kind', [
        z.object({ kind: z.literal('surge'), multiplier: z.number() }),
        z.object({ kind: z.literal('discount'), percent: z.number() }),
        z.object({ kind: z.literal('toll'), surcharge: z.number() })
      ])
    )
    .max(10)
});

const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export function createDispatchRouter(
  coordinator: DispatchCoordinator,
  history: RecentEventsObserver
): Router {
  const router = Router();

  /**
   * @swagger
   * /api/dispatch/status:
   *   get:
   *     summary: Driver counts, ride counts and active pricing/matching setup
   *     tags: [Dispatch]
   *     responses:
   *       200:
   *         description: System status
   */
  router.get('/status', (req, res) => {
    res.json({
      success: true,
      data: coordinator.getSystemStatus()
    });
  });

  /**
   * @swagger
   * /api/dispatch/matching-policy:
   *   put:
   *     summary: Swap the matching policy for later requests
   *     tags: [Dispatch]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [policy]
   *             properties:
   *               policy:
   *                 type: string
   *                 enum: [nearest, highest-rated]
   *     responses:
   *       200:
   *         description: Policy swapped
   */
  router.put('/matching-policy', (req, res, next) => {
    try {
      const { policy } = matchingPolicySchema.parse(req.body);
      coordinator.setMatchingPolicy(createMatchingPolicy(policy));

      res.json({
        success: true,
        data: { matchingPolicy: policy }
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/dispatch/fare-pipeline:
   *   put:
   *     summary: Swap the fare pipeline for later settlements
   *     description: Modifiers wrap the base stage in list order, innermost first.
   *     tags: [Dispatch]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [modifiers]
   *             properties:
   *               modifiers:
   *                 type: array
   *                 items:
   *                   type: object
   *                   properties:
   *                     kind:
   *                       type: string
   *                       enum: [surge, discount, toll]
   *                     multiplier:
   *                       type: number
   *                     percent:
   *                       type: number
   *                     surcharge:
   *                       type: number
   *     responses:
   *       200:
   *         description: Pipeline swapped
   *       400:
   *         description: Stage parameter out of bounds
   */
  router.put('/fare-pipeline', (req, res, next) => {
    try {
      const { modifiers } = farePipelineSchema.parse(req.body);
      const pipeline = buildFarePipeline(modifiers);
      coordinator.setFarePipeline(pipeline);

      res.json({
        success: true,
        data: { farePipeline: pipeline.describe() }
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * @swagger
   * /api/dispatch/events:
   *   get:
   *     summary: Most recent dispatch events, oldest first
   *     tags: [Dispatch]
   *     parameters:
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           default: 50
   *     responses:
   *       200:
   *         description: Recent events
   */
  router.get('/events', (req, res, next) => {
    try {
      const { limit } = eventsQuerySchema.parse(req.query);
      res.json({
        success: true,
        data: history.recent(limit)
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
