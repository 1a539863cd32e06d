import { Router } from 'express';
import { z } from 'zod';
import { createAdminGuard } from '../middleware/auth.js';
import { errorMessage } from '../errors.js';
import type { ScanManager } from '../services/scanManager.js';

export const ScanRequestSchema = z.object({
  videoPath: z.string().min(1),
  frameInterval: z.number().int().positive().optional(),
  workers: z.number().int().min(1).max(32).optional(),
  saveFrames: z.boolean().optional(),
  saveAllFrames: z.boolean().optional(),
});

export function createScansRouter(scanManager: ScanManager, options: { adminPassword: string | null }): Router {
  const router = Router();
  const requireAdmin = createAdminGuard(options.adminPassword);

  router.get('/api/scans', (_req, res) => {
    res.json(scanManager.list());
  });

  router.get('/api/scans/:id', (req, res) => {
    const scan = scanManager.get(req.params.id);
    if (!scan) {
      res.status(404).json({ error: 'Scan not found' });
      return;
    }
    res.json(scan);
  });

  router.post('/api/scans', requireAdmin, (req, res) => {
    const parsed = ScanRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid scan request', details: parsed.error.flatten().fieldErrors });
      return;
    }

    try {
      const result = scanManager.enqueue(parsed.data);
      res.status(202).json(result);
    } catch (err) {
      const message = errorMessage(err);
      console.error('Start scan error:', message);
      res.status(500).json({ error: message });
    }
  });

  router.post('/api/scans/:id/cancel', requireAdmin, (req, res) => {
    const id = req.params.id;
    if (!scanManager.get(id)) {
      res.status(404).json({ error: 'Scan not found' });
      return;
    }

    try {
      const status = scanManager.cancel(id);
      res.json({ status, scanId: id });
    } catch (err) {
      const message = errorMessage(err);
      console.error('Cancel scan error:', message);
      res.status(400).json({ error: message });
    }
  });

  return router;
}
