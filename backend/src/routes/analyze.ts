import { Router } from 'express';
import fs from 'fs/promises';
import type multer from 'multer';
import { analyzeMenuImage, type PipelineDeps } from '../services/menu-pipeline.js';
import { errorMessage } from '../utils/errors.js';
import { imageMimeType } from '../utils/file-handler.js';

export function createAnalyzeRouter(deps: PipelineDeps, upload: multer.Multer): Router {
  const router = Router();

  router.post('/', upload.single('image'), async (req, res, next) => {
    if (!req.file) {
      res.status(400).json({ error: 'No file uploaded' });
      return;
    }

    const file = req.file;
    try {
      if (file.size === 0) {
        res.status(400).json({ error: 'Empty upload' });
        return;
      }

      const data = await fs.readFile(file.path);
      const mimeType = imageMimeType(file) ?? file.mimetype;
      console.log(`[analyze] ${file.originalname} (${data.length} bytes, ${mimeType})`);

      const result = await analyzeMenuImage({ data, mimeType }, deps);
      console.log(`[analyze] ${result.wines.length} wines from ${result.ocr.rowCount} rows (${result.ocr.status})`);
      res.json(result);
    } catch (err) {
      next(err);
    } finally {
      await fs.rm(file.path, { force: true }).catch(err => {
        console.warn(`[analyze] could not remove upload ${file.path}: ${errorMessage(err)}`);
      });
    }
  });

  return router;
}
