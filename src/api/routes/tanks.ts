/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * AquaLog - Tank Routes
 * CRUD för tankprofiler
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AppContext } from '../../context';
import { TankNotFoundError } from '../../utils/errors';
import { respondWithError } from '../middleware';
import type { CreateTankRequest, UpdateTankRequest } from '../validation';
import { CreateTankSchema, UpdateTankSchema, parseId, validateBody } from '../validation';

export function createTankRoutes(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/tanks
   */
  router.get('/', (req: Request, res: Response) => {
    try {
      const tanks = ctx.tanks.list();
      res.json({ success: true, tanks, count: tanks.length });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * POST /api/tanks
   */
  router.post('/', validateBody(CreateTankSchema), (req: Request, res: Response) => {
    try {
      const body: CreateTankRequest = req.body;
      const tank = ctx.tanks.add(body.name, body.volumeL ?? null, body.notes ?? '');
      res.status(201).json({ success: true, tank });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * GET /api/tanks/:id
   */
  router.get('/:id', (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const tank = ctx.tanks.getById(tankId);
      if (!tank) {
        throw new TankNotFoundError(tankId);
      }
      res.json({ success: true, tank });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * PATCH /api/tanks/:id
   * Namn, volym och anteckningar uppdateras i en och samma transaktion
   */
  router.patch('/:id', validateBody(UpdateTankSchema), (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const body: UpdateTankRequest = req.body;

      const tank = ctx.storage.transaction(() => {
        let updated = ctx.tanks.getById(tankId);
        if (!updated) {
          throw new TankNotFoundError(tankId);
        }
        if (body.name !== undefined) {
          updated = ctx.tanks.rename(tankId, body.name);
        }
        if (body.volumeL !== undefined) {
          updated = ctx.tanks.updateVolume(tankId, body.volumeL);
        }
        if (body.notes !== undefined) {
          updated = ctx.tanks.updateNotes(tankId, body.notes);
        }
        return updated;
      });

      res.json({ success: true, tank });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  /**
   * DELETE /api/tanks/:id
   * Tar bort tanken och allt som hör till den
   */
  router.delete('/:id', (req: Request, res: Response) => {
    try {
      const tankId = parseId(req.params.id);
      const removal = ctx.tanks.remove(tankId);
      res.json({ success: true, tankId, removed: Object.fromEntries(removal.removed) });
    } catch (error) {
      respondWithError(req, res, error);
    }
  });

  return router;
}
