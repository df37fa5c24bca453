/**
 * API Routes
 * Status, sound catalog, asset serving and offline analysis
 */

import express from 'express';
import path from 'path';
import { logger } from '../utils/logger.js';
import { pcm16FromBuffer } from '../audio/pcm.js';
import { MIME_TYPES } from '../sounds/SoundCatalog.js';
import { DecodeError, NotFound, errorMessage } from '../errors.js';
import type { Orchestrator } from '../orchestrator/index.js';

export const ANALYZE_BODY_LIMIT = '50mb';

export function createApiRouter(engine: Orchestrator): express.Router {
  const router = express.Router();

  /**
   * GET /status
   */
  router.get('/status', (_req, res) => {
    res.json(engine.getStatus());
  });

  /**
   * GET /sounds
   * Category -> filenames
   */
  router.get('/sounds', (_req, res) => {
    const catalog = engine.getCatalog();
    res.json(catalog ? catalog.listing() : {});
  });

  /**
   * GET /sound/:category/:filename
   */
  router.get('/sound/:category/:filename', (req, res) => {
    const catalog = engine.getCatalog();
    if (!catalog) {
      return res.status(404).json({ error: 'Not found' });
    }

    let filePath: string;
    try {
      filePath = catalog.assetPath(req.params.category, req.params.filename);
    } catch (err) {
      if (err instanceof NotFound) {
        return res.status(404).json({ error: 'Not found' });
      }
      throw err;
    }

    const contentType = MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
    res.sendFile(filePath, { headers: { 'Content-Type': contentType } }, (err) => {
      if (!err) return;
      logger.error('API', `Failed to send ${filePath}`, err);
      if (!res.headersSent) {
        res.status(404).json({ error: 'Not found' });
      }
    });
  });

  /**
   * POST /analyze
   * Body: raw little-endian PCM16 at the engine sample rate
   */
  router.post(
    '/analyze',
    express.raw({ type: 'application/octet-stream', limit: ANALYZE_BODY_LIMIT }),
    async (req, res) => {
      if (!engine.isReady()) {
        return res.status(503).json({ error: 'Engine not ready' });
      }

      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        return res.status(400).json({ error: 'Expected an application/octet-stream body' });
      }

      let samples: Int16Array;
      try {
        samples = pcm16FromBuffer(body);
      } catch (err) {
        if (err instanceof DecodeError) {
          return res.status(400).json({ error: err.message });
        }
        throw err;
      }

      const { windowSamples } = engine.config.audio;
      if (samples.length < windowSamples) {
        return res.status(400).json({
          error: `Recording is shorter than one window (${samples.length} < ${windowSamples} samples)`,
        });
      }

      try {
        const result = await engine.analyze(samples);
        logger.info('API', `Analyzed ${result.windows} windows, max confidence ${result.maxConfidence.toFixed(3)}`);
        res.json(result);
      } catch (err) {
        logger.error('API', 'Analysis failed', err);
        res.status(500).json({ error: errorMessage(err) });
      }
    },
  );

  return router;
}
