import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import * as path from 'path';
import type { AppConfig } from './config';
import { DataProcessor } from './dataProcessor';
import { AppError, DataLoadError, errorMessage } from './errors';
import type { QueryService } from './queryService';
import { RESULTS_FILE_NAME, ResultsExporter } from './resultsExporter';
import type { SessionStore } from './sessionStore';
import type { SheetsLoader } from './sheetsLoader';
import { describe } from './statistics';
import type { Dataset, Session } from './types';
import { Visualization } from './visualization';

const CSV_EXTENSIONS = ['.csv'];
const EXCEL_EXTENSIONS = ['.xlsx', '.xls'];

export interface AppDependencies {
  config: AppConfig;
  store: SessionStore;
  queryService: QueryService;
  sheetsLoader: SheetsLoader;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof AppError) {
    res.status(error.status).json({ error: error.message, details: error.details });
    return;
  }
  res.status(500).json({ error: fallback, details: errorMessage(error) });
}

function sessionOverview(session: Session) {
  const dataset = session.dataset;
  const stats = DataProcessor.computeStats(dataset);
  return {
    id: session.id,
    originalName: dataset.originalName,
    source: dataset.source,
    sheetName: dataset.sheetName,
    rows: stats.rows,
    columns: stats.columns,
    columnTypes: Object.fromEntries(dataset.headers.map((h, i) => [h, dataset.columnTypes[i]])),
    numericColumns: DataProcessor.numericColumns(dataset),
    summary: stats.summary,
    preview: DataProcessor.preview(dataset),
    createdAt: dataset.createdAt,
  };
}

function parseUpload(file: Express.Multer.File): Dataset {
  const ext = path.extname(file.originalname).toLowerCase();
  if (CSV_EXTENSIONS.includes(ext)) {
    return DataProcessor.processCsvBuffer(file.buffer, file.originalname);
  }
  return DataProcessor.processExcelBuffer(file.buffer, file.originalname);
}

export function createApp(deps: AppDependencies): express.Express {
  const { config, store, queryService, sheetsLoader } = deps;
  const app = express();

  // CORS middleware for cross-origin requests from frontend
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, Authorization');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  app.use(express.json());

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.upload.maxFileSizeBytes },
    fileFilter: (req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (CSV_EXTENSIONS.includes(ext) || EXCEL_EXTENSIONS.includes(ext)) {
        cb(null, true);
      } else {
        cb(new DataLoadError('Only CSV or Excel files (.csv, .xlsx, .xls) are allowed'));
      }
    },
  });

  app.post('/upload', upload.single('file'), (req, res) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: 'No file uploaded' });
      }

      console.log('📥 Processing upload:', req.file.originalname);
      const dataset = parseUpload(req.file);
      const session = store.saveDataset(dataset, readString(req.body?.sessionId));
      console.log(`✅ Loaded ${dataset.rowCount} rows x ${dataset.columnCount} columns into session ${session.id}`);

      res.json(sessionOverview(session));
    } catch (error) {
      console.error('Upload error:', error);
      sendError(res, error, 'Failed to process file');
    }
  });

  app.post('/sheets', async (req, res) => {
    try {
      const url = readString(req.body?.url);
      if (!url) {
        return res.status(400).json({ error: 'url is required' });
      }

      const dataset = await sheetsLoader.loadGoogleSheet(url);
      const session = store.saveDataset(dataset, readString(req.body?.sessionId));
      res.json(sessionOverview(session));
    } catch (error) {
      console.error('Google Sheet error:', error);
      sendError(res, error, 'Failed to load Google Sheet');
    }
  });

  app.get('/data/:id', (req, res) => {
    try {
      res.json(sessionOverview(store.get(req.params.id)));
    } catch (error) {
      console.error('Get data error:', error);
      sendError(res, error, 'Failed to retrieve data');
    }
  });

  app.get('/data/:id/statistics', (req, res) => {
    try {
      const dataset = store.get(req.params.id).dataset;
      res.json({
        ...describe(dataset),
        summary: DataProcessor.computeStats(dataset).summary,
      });
    } catch (error) {
      console.error('Statistics error:', error);
      sendError(res, error, 'Failed to compute statistics');
    }
  });

  app.get('/data/:id/visualization', (req, res) => {
    try {
      const dataset = store.get(req.params.id).dataset;
      const column = readString(req.query.column);
      const binsParam = readString(req.query.bins);
      const bins = binsParam === undefined ? undefined : Number(binsParam);
      res.json(Visualization.buildHistogram(dataset, column, bins));
    } catch (error) {
      console.error('Visualization error:', error);
      sendError(res, error, 'Error creating visualization');
    }
  });

  app.post('/query', async (req, res) => {
    try {
      const dataId = readString(req.body?.dataId);
      const question = readString(req.body?.question);
      if (!dataId || !question) {
        return res.status(400).json({ error: 'dataId and question are required' });
      }

      const response = await queryService.askAboutData({
        dataId,
        question,
        useWebSearch: req.body.useWebSearch === true,
        mainColumn: readString(req.body.mainColumn),
      });
      res.json(response);
    } catch (error) {
      console.error('Query error:', error);
      sendError(res, error, 'Failed to process query');
    }
  });

  app.get('/data/:id/results', (req, res) => {
    try {
      res.json({ results: store.get(req.params.id).results });
    } catch (error) {
      console.error('Results error:', error);
      sendError(res, error, 'Failed to retrieve results');
    }
  });

  app.get('/data/:id/results.csv', (req, res) => {
    try {
      const csv = ResultsExporter.toCsv(store.get(req.params.id).results);
      res.attachment(RESULTS_FILE_NAME);
      res.type('text/csv').send(csv);
    } catch (error) {
      console.error('Results export error:', error);
      sendError(res, error, 'Failed to export results');
    }
  });

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      llmProvider: config.llm.provider,
      webSearch: config.search.apiKey ? 'available' : 'unavailable',
      sessions: store.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/', (req, res) => {
    res.json({
      message: 'Data Analysis Assistant API',
      endpoints: {
        'POST /upload': 'Upload a CSV or Excel file',
        'POST /sheets': 'Load the first worksheet of a Google Sheet',
        'GET /data/:id': 'Preview and overview of the loaded data',
        'GET /data/:id/statistics': 'Descriptive statistics',
        'GET /data/:id/visualization': 'Histogram of a numeric column',
        'POST /query': 'Ask a question about the loaded data',
        'GET /data/:id/results': 'Question and answer history',
        'GET /data/:id/results.csv': 'Download results as CSV',
        'GET /health': 'Check system health',
      },
    });
  });

  // Errors raised by middleware (multer limits and file filter) end up here.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).json({ error: error.message, details: error.field });
    }
    console.error('Unhandled error:', error);
    sendError(res, error, 'Internal server error');
  });

  return app;
}
