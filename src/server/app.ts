/**
 * HTTP transport
 */

import express, { type Express, type Request, type RequestHandler } from 'express';
import cors from 'cors';
import { createServer, type Server } from 'http';
import type { z } from 'zod';
import type { Deps } from '../app/container';
import { LOGGER_NAME } from '../lib/logger';
import type { Operation } from '../prompts/catalog';
import type { CareerService } from '../services/career-service';
import {
  CareerPlanRequestSchema,
  EndpointMetricsQuerySchema,
  MentorRequestSchema,
  PromoteAliasSchema,
  RegisterPromptSchema,
  ReviewRequestSchema,
  SkillGapRequestSchema,
  parseInput,
} from '../services/schemas';
import { requestContext } from './middleware/request-context';
import { errorHandler } from './middleware/error-handler';

const PLATFORM = 'Google Cloud Platform';

type UseCase = (service: CareerService, input: unknown) => Promise<string>;

const useCase = <S extends z.ZodTypeAny>(
  schema: S,
  run: (service: CareerService, request: z.output<S>) => Promise<string>,
): UseCase => {
  return (service, input) => run(service, parseInput(schema, input));
};

const USE_CASES: Record<Operation, UseCase> = {
  analyze_skills: useCase(SkillGapRequestSchema, (service, request) => service.analyzeSkills(request)),
  generate_plan: useCase(CareerPlanRequestSchema, (service, request) => service.generatePlan(request)),
  performance_review: useCase(ReviewRequestSchema, (service, request) => service.reviewDraft(request)),
  mentor_simulation: useCase(MentorRequestSchema, (service, request) => service.mentorTurn(request)),
};

/**
 * JSON body as a plain object; anything else counts as empty
 */
function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
}

export function createApp(deps: Deps): Express {
  const { careerService, catalog, config, telemetry } = deps;
  const logger = deps.logger.child({ component: 'HttpServer' });
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({ origin: '*' }));
  app.use(requestContext(logger));
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    telemetry.logEvent('health_check');
    res.json({
      status: 'ok',
      message: 'AI Career Companion is running',
      version: config.server.version,
      platform: PLATFORM,
    });
  });

  app.get('/logs/health', (_req, res) => {
    logger.info('Logging system health check');
    res.json({
      status: 'ok',
      message: 'Logging system is operational',
      logger_name: LOGGER_NAME,
      log_level: deps.logger.level,
      platform: PLATFORM,
    });
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', telemetry.contentType);
      res.send(await telemetry.metrics());
    } catch (error) {
      next(error);
    }
  });

  for (const entry of catalog.entries) {
    const run = USE_CASES[entry.operation];
    const handler: RequestHandler = async (req, res, next) => {
      try {
        const response = await run(careerService, bodyOf(req));
        res.json({ [entry.responseKey]: response });
      } catch (error) {
        next(error);
      }
    };
    app.post(entry.endpoint, handler);
  }

  app.get('/prompts/list', async (_req, res, next) => {
    try {
      res.json({ prompts: await careerService.listPrompts() });
    } catch (error) {
      next(error);
    }
  });

  app.post('/prompts/register', async (req, res, next) => {
    try {
      const input = parseInput(RegisterPromptSchema, { ...req.query, ...bodyOf(req) });
      const message = await careerService.registerPrompt(
        input.prompt_name,
        input.prompt_content,
        input.model,
      );
      res.json({ message });
    } catch (error) {
      next(error);
    }
  });

  app.post('/prompts/:name/alias', async (req, res, next) => {
    try {
      const { version, alias } = parseInput(PromoteAliasSchema, bodyOf(req));
      await careerService.promotePrompt(req.params.name, version, alias);
      res.json({
        message: `Alias '${alias}' of '${req.params.name}' now points to version ${version}`,
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/prompts/metrics/:endpoint', async (req, res, next) => {
    try {
      const { days } = parseInput(EndpointMetricsQuerySchema, req.query);
      res.json(await careerService.getEndpointMetrics(req.params.endpoint, days));
    } catch (error) {
      next(error);
    }
  });

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found', path: req.path, request_id: res.locals.requestId });
  });

  app.use(errorHandler(logger));

  return app;
}

/**
 * Listen on `port`; 0 picks a free port
 */
export function startServer(app: Express, port: number, host: string): Promise<Server> {
  const server = createServer(app);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
