import cors from 'cors';
import { CsvError } from 'csv-parse';
import express, { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { parseStatementOptions, StatementTextRequestSchema, toIngestOptions } from './application/dto/StatementRequestDTO.js';
import { CATEGORIES } from './domain/entities/Category.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { CsvColumnsMissing } from './infrastructure/adapters/parser/CsvStatementReader.js';

const isCsvUpload = (file: Express.Multer.File): boolean =>
  file.mimetype === 'text/csv' || file.mimetype === 'application/vnd.ms-excel' || /\.csv$/i.test(file.originalname);

const isPdfUpload = (file: Express.Multer.File): boolean =>
  file.mimetype === 'application/pdf' || /\.pdf$/i.test(file.originalname);

export class UnsupportedUpload extends Error {
  readonly name = 'UnsupportedUpload';
}

/** Client mistakes in the upload or the request body are 400s; everything else is ours. */
export const statusForError = (error: unknown): 400 | 500 =>
  error instanceof ZodError ||
  error instanceof UnsupportedUpload ||
  error instanceof CsvColumnsMissing ||
  error instanceof CsvError ||
  error instanceof multer.MulterError
    ? 400
    : 500;

export const createApp = (container: AppContainer): express.Express => {
  const app = express();
  const logger = container.logger.child({ component: 'http' });

  // Configure multer for file uploads (store in memory)
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: 10 * 1024 * 1024, // 10MB max
    },
    fileFilter: (req, file, cb) => {
      if (isPdfUpload(file) || isCsvUpload(file)) {
        cb(null, true);
      } else {
        cb(new UnsupportedUpload('Only PDF or CSV statements are allowed'));
      }
    },
  });

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/', (req, res) => {
    res.json({
      name: 'Statement Ledger API',
      version: '0.1.0',
      status: 'running',
      modelSupport: container.hasModelSupport(),
      endpoints: {
        info: 'GET /',
        categories: 'GET /api/categories',
        upload: 'POST /api/statements',
        text: 'POST /api/statements/text',
      },
    });
  });

  app.get('/api/categories', (req, res) => {
    res.json({ categories: CATEGORIES });
  });

  app.post('/api/statements', upload.single('statement'), async (req, res, next) => {
    try {
      if (!req.file) {
        return res.status(400).json({
          success: false,
          error: 'No statement file provided. Upload a PDF or CSV as "statement".',
        });
      }

      const options = parseStatementOptions(req.body);
      const result = isCsvUpload(req.file)
        ? await container.ingestionService.ingestCsv(req.file.buffer.toString('utf8'), options)
        : await container.ingestionService.ingestPdf(req.file.buffer, options);

      logger.info('Statement ingested', {
        fileName: req.file.originalname,
        outcome: result.extraction.outcome,
        transactions: result.transactions.length,
      });

      return res.json({ success: true, ...result });
    } catch (error) {
      return next(error);
    }
  });

  app.post('/api/statements/text', async (req, res, next) => {
    try {
      const { text, ...options } = StatementTextRequestSchema.parse(req.body);
      const result = await container.ingestionService.ingestText(text, toIngestOptions(options));

      logger.info('Statement text ingested', {
        outcome: result.extraction.outcome,
        transactions: result.transactions.length,
      });

      return res.json({ success: true, ...result });
    } catch (error) {
      return next(error);
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ success: false, error: 'API endpoint not found' });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ZodError) {
      return res.status(400).json({ success: false, error: error.issues.map((issue) => issue.message).join('; ') });
    }
    if (statusForError(error) === 400 && error instanceof Error) {
      return res.status(400).json({ success: false, error: error.message });
    }

    const message = error instanceof Error ? error.message : 'Unable to ingest statement';
    logger.error('Statement ingestion failed', error);
    return res.status(500).json({ success: false, error: message });
  });

  return app;
};
