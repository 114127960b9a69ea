import { Router, type Request, type Response } from 'express';
import { pool, query } from '../db';
import { parsePositiveInt } from '../config/env';
import { probeFailure, withTimeout } from '../lib/timeouts';
import { getCatalogConnectionConfig } from '../services/catalogConnections.service';

const router = Router();

const DB_TIMEOUT_MS = parsePositiveInt(process.env.HEALTH_DB_TIMEOUT_MS, 1500);

router.get('/health/live', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

/**
 * Ready when the service database answers and migrations have run. Catalog settings are reported
 * but never make the service unready; catalogs are reached per request.
 */
router.get('/health/ready', async (_req: Request, res: Response) => {
  const start = Date.now();
  const details: Record<string, unknown> = {};
  let ready = true;

  try {
    await withTimeout(query('SELECT 1'), DB_TIMEOUT_MS, 'service database');
    details.db = { ok: true };
  } catch (error) {
    details.db = probeFailure(error);
    ready = false;
  }

  try {
    const result = await withTimeout(
      query<{ latest: string | null }>('SELECT MAX(name) AS latest FROM pgmigrations'),
      DB_TIMEOUT_MS,
      'migration table'
    );
    details.migrations = { ok: true, latest: result.rows[0]?.latest ?? null };
  } catch (error) {
    details.migrations = probeFailure(error);
    ready = false;
  }

  try {
    const [primary, secondary] = await withTimeout(
      Promise.all([getCatalogConnectionConfig('primary'), getCatalogConnectionConfig('secondary')]),
      DB_TIMEOUT_MS,
      'catalog settings'
    );
    details.catalogs = { primaryConfigured: primary !== null, secondaryConfigured: secondary !== null };
  } catch (error) {
    details.catalogs = probeFailure(error);
  }

  details.durationMs = Date.now() - start;
  details.pool = {
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount
  };

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ok' : 'not_ready',
    ready,
    timestamp: new Date().toISOString(),
    details
  });
});

export default router;
