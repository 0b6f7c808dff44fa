import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { WindowQuerySchema } from './application/dto/SessionDTO.js';
import { AnalysisError, AnalysisErrorCode } from './domain/errors/AnalysisErrors.js';
import { computeWindow } from './domain/services/AnalysisWindowCalculator.js';
import { describeStatement } from './domain/services/StatementMetadata.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const statusByCode: Record<AnalysisErrorCode, number> = {
  MISSING_DATE_COLUMN: 422,
  HOLDER_MISMATCH: 409,
  DUPLICATE_STATEMENT: 409,
  NOT_FOUND: 404,
};

class UnsupportedUploadError extends Error {
  constructor(fileName: string) {
    super(`Only JSON statement files are allowed (got ${fileName})`);
    this.name = 'UnsupportedUploadError';
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const sendError = (res: Response, error: unknown, fallback: string) => {
  if (error instanceof ZodError) {
    return res.status(400).json({ error: 'Invalid request', issues: error.issues });
  }

  if (error instanceof AnalysisError) {
    return res.status(statusByCode[error.code]).json({ error: error.message, code: error.code });
  }

  if (error instanceof UnsupportedUploadError) {
    return res.status(400).json({ error: error.message });
  }

  if (isRecord(error) && error.type === 'entity.too.large') {
    return res.status(413).json({ error: 'Request body exceeds the upload limit' });
  }

  if (error instanceof SyntaxError) {
    return res.status(400).json({ error: `Malformed JSON: ${error.message}` });
  }

  if (error instanceof multer.MulterError) {
    return res.status(400).json({ error: error.message, code: error.code });
  }

  console.error(`${fallback}:`, error);
  const message = error instanceof Error ? error.message : fallback;
  return res.status(500).json({ error: message });
};

export const createApp = (container: AppContainer): Express => {
  const app = express();
  const { sessionService, analysisService } = container;

  const { uploadLimitBytes } = container.config.server;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: uploadLimitBytes,
    },
    fileFilter: (req, file, cb) => {
      if (file.mimetype === 'application/json' || file.originalname.toLowerCase().endsWith('.json')) {
        cb(null, true);
      } else {
        cb(new UnsupportedUploadError(file.originalname));
      }
    },
  });

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: uploadLimitBytes }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Statement Analysis API',
      version: '0.1.0',
      banks: container.registry.banks(),
      maxLedgerRows: container.config.analysis.maxLedgerRows,
    });
  });

  app.get('/api/window', (req, res) => {
    try {
      const { anchor } = WindowQuerySchema.parse(req.query);
      res.json({ anchor, window: computeWindow(anchor) });
    } catch (error) {
      sendError(res, error, 'Unable to compute window');
    }
  });

  app.post('/api/sessions', async (req, res) => {
    try {
      const session = await sessionService.createSession(req.body ?? {});
      res.status(201).json({ session });
    } catch (error) {
      sendError(res, error, 'Unable to create session');
    }
  });

  app.get('/api/sessions/:sessionId', async (req, res) => {
    try {
      const session = await sessionService.getSession(req.params.sessionId);
      const statements = await sessionService.describeStatements(session.id);
      res.json({ session, statements });
    } catch (error) {
      sendError(res, error, 'Unable to load session');
    }
  });

  app.post('/api/sessions/:sessionId/statements', async (req, res) => {
    try {
      const statement = await sessionService.addStatement(req.params.sessionId, req.body);
      res.status(201).json({ statement: describeStatement(statement) });
    } catch (error) {
      sendError(res, error, 'Unable to add statement');
    }
  });

  app.post('/api/sessions/:sessionId/statements/upload', upload.single('statement'), async (req, res) => {
    try {
      if (!req.file) {
        res.status(400).json({
          error: 'No statement file provided. Upload a parsed statement as JSON in the "statement" field.',
        });
        return;
      }

      const payload: unknown = JSON.parse(req.file.buffer.toString('utf8'));
      const input = isRecord(payload) ? { sourceFileName: req.file.originalname, ...payload } : payload;
      const statement = await sessionService.addStatement(req.params.sessionId, input);

      res.status(201).json({ statement: describeStatement(statement) });
    } catch (error) {
      sendError(res, error, 'Unable to upload statement');
    }
  });

  app.delete('/api/sessions/:sessionId/statements/:statementId', async (req, res) => {
    try {
      await sessionService.removeStatement(req.params.sessionId, req.params.statementId);
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'Unable to remove statement');
    }
  });

  app.get('/api/sessions/:sessionId/analysis', async (req, res) => {
    try {
      const report = await analysisService.analyzeSession(req.params.sessionId);
      res.json(report);
    } catch (error) {
      sendError(res, error, 'Unable to analyze session');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error, 'Request failed');
  });

  return app;
};
