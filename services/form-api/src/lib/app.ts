/**
 * Form API
 *
 * POST /api/fill           - Fill a template from free text
 * POST /api/classify-hs    - HS code suggestions for a product description
 * GET  /api/templates      - List templates
 * POST /api/templates      - Create a template
 * GET  /api/templates/:name - Get one template
 * GET  /api/history        - Past submissions, most similar first
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  errorMessage,
  findAutofillSource,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  logger,
  parseClassifyRequest,
  parseCreateTemplateRequest,
  parseFillRequest,
  runWithContext,
  setContextTemplate,
  ValidationError,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_TOP_N,
  type ClassifyResponse,
  type FillResponse,
  type HistoryEntry,
  type HistoryResponse,
  type HistoryStore,
  type HsClassifier,
  type SubmissionRecord,
  type TradeAgent,
} from '@tradeform/shared';
import { asyncHandler, errorHandler, sendError } from './http';
import { normalizeTemplateName, type FileTemplateStore } from './templates';

export const SERVICE_NAME = 'form-api';

export interface AppDependencies {
  templates: FileTemplateStore;
  classifier: HsClassifier;
  tradeAgent: TradeAgent;
  history: HistoryStore;
  aiEnabled: boolean;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseLimit(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_HISTORY_LIMIT;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError('limit must be a positive integer', [`/limit: ${raw}`]);
  }
  return parseInt(raw, 10);
}

function toHistoryEntry(record: SubmissionRecord): HistoryEntry {
  return {
    id: record.id,
    template: record.templateName,
    input_text: record.inputText,
    data: record.filledForm,
    timestamp: record.createdAt,
  };
}

export function createApp(deps: AppDependencies): Express {
  const { templates, classifier, tradeAgent, history } = deps;
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;
      const labels = { method: req.method, path, status: res.statusCode.toString() };

      httpRequestDurationHistogram.observe(labels, duration);
      httpRequestsCounter.inc(labels);

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const historyReachable = await history.ping();

      res.status(historyReachable ? 200 : 503).json({
        status: historyReachable ? 'healthy' : 'unhealthy',
        service: SERVICE_NAME,
        history_store: history.kind,
        history_reachable: historyReachable,
        corpus_size: classifier.corpusSize,
        ai_enabled: deps.aiEnabled,
        embeddings_enabled: classifier.embeddingsEnabled,
        timestamp: new Date().toISOString(),
      });
    })
  );

  // Metrics endpoint
  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    })
  );

  /**
   * POST /api/fill
   * Extract, autofill from history, classify HS codes, optionally save.
   */
  app.post(
    '/api/fill',
    asyncHandler(async (req, res) => {
      const body = parseFillRequest(req.body);
      const templateName = normalizeTemplateName(body.template);
      setContextTemplate(templateName);

      const template = await templates.get(templateName);

      const useDb = body.use_db ?? true;
      const source = useDb ? await findAutofillSource(history, body.prompt, templateName) : null;

      const filled = await tradeAgent.fillTradeForm(template, body.prompt, {
        useAi: body.use_ai ?? true,
        autoClassifyHs: body.auto_classify_hs ?? true,
        autofill: source?.filledForm ?? null,
      });

      if (body.save_to_db ?? false) {
        try {
          const record = await history.save({ templateName, inputText: body.prompt, filledForm: filled });
          logger.info('Submission saved', { submission_id: record.id, has_embedding: record.embedding !== null });
        } catch (error) {
          logger.error('Submission save failed, returning filled form anyway', error, {
            error_message: errorMessage(error),
          });
        }
      }

      const response: FillResponse = { filled, from_db: source !== null, template: templateName };
      res.json(response);
    })
  );

  /**
   * POST /api/classify-hs
   */
  app.post(
    '/api/classify-hs',
    asyncHandler(async (req, res) => {
      const body = parseClassifyRequest(req.body);
      const suggestions = await classifier.classify(body.product_description, body.top_n ?? DEFAULT_TOP_N);

      const response: ClassifyResponse = {
        suggestions,
        count: suggestions.length,
        product_description: body.product_description,
      };
      res.json(response);
    })
  );

  app.get(
    '/api/templates',
    asyncHandler(async (_req, res) => {
      res.json({ templates: await templates.list() });
    })
  );

  app.post(
    '/api/templates',
    asyncHandler(async (req, res) => {
      const body = parseCreateTemplateRequest(req.body);
      const name = await templates.create(body.name, body.template);
      res.status(201).json({ success: true, name });
    })
  );

  app.get(
    '/api/templates/:name',
    asyncHandler(async (req, res) => {
      const template = await templates.get(req.params.name);
      res.json({ template });
    })
  );

  /**
   * GET /api/history?query=&limit=&template=
   */
  app.get(
    '/api/history',
    asyncHandler(async (req, res) => {
      const query = queryString(req.query.query) ?? '';
      const limit = parseLimit(queryString(req.query.limit));
      const templateParam = queryString(req.query.template);
      const templateName = templateParam ? normalizeTemplateName(templateParam) : undefined;

      const records = await history.findSimilar(query, limit, templateName);
      const response: HistoryResponse = { history: records.map(toHistoryEntry) };
      res.json(response);
    })
  );

  app.use((_req: Request, res: Response) => {
    sendError(res, 404, 'not_found', 'Route not found');
  });

  app.use(errorHandler);

  return app;
}
