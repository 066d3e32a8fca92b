import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { config, type Config } from './config';
import { toServiceError } from './core/errors';
import { registerRoutes } from './adapters/http-routes';
import { logger } from './observability/logger';
import { AnalysisService } from './service/analysis-service';
import { BuildService } from './service/build-service';
import { UploadService } from './service/upload-service';
import type { AnalysisRecord, BuildRecord } from './service/types';
import { createIdGenerator, type IdGenerator } from './storage/ids';
import { InMemoryRecordStore, type RecordStore } from './storage/record-store';

export type AppDeps = {
  config?: Config;
  buildStore?: RecordStore<BuildRecord>;
  analysisStore?: RecordStore<AnalysisRecord>;
  ids?: IdGenerator;
  // pino request logging
  requestLogging?: boolean;
};

function statusOf(err: FastifyError): number {
  if (err.validation) return 422;
  if (typeof err.statusCode === 'number' && err.statusCode >= 400) return err.statusCode;
  return toServiceError(err).httpStatus;
}

export async function buildApp(deps: AppDeps = {}): Promise<FastifyInstance> {
  const cfg = deps.config ?? config;
  const ids = deps.ids ?? createIdGenerator(cfg.idStrategy);
  const app = Fastify({
    logger: deps.requestLogging ?? true,
    // wrong types are rejected, never converted
    ajv: { customOptions: { coerceTypes: false } }
  });

  await app.register(cors, {
    origin: cfg.corsOrigins,
    credentials: cfg.corsOrigins !== '*'
  });
  await app.register(multipart, {
    limits: { fileSize: cfg.maxUploadBytes, files: 1 }
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    const status = statusOf(err);
    if (status >= 500) {
      logger.error('request failed', { method: request.method, url: request.url }, err);
    } else {
      logger.warn('request rejected', { method: request.method, url: request.url, status, message: err.message });
    }
    reply.status(status).send({ detail: err.message });
  });

  registerRoutes(app, {
    builds: new BuildService(deps.buildStore ?? new InMemoryRecordStore<BuildRecord>(), ids),
    analyses: new AnalysisService(deps.analysisStore ?? new InMemoryRecordStore<AnalysisRecord>(), ids),
    uploads: new UploadService(ids)
  });

  return app;
}
