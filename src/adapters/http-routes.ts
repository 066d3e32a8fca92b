import type { FastifyInstance } from 'fastify';
import { ValidationError } from '../core/errors';
import type { AnalysisService } from '../service/analysis-service';
import type { BuildService } from '../service/build-service';
import type { UploadService } from '../service/upload-service';

export const SERVICE_NAME = 'Container Lab';
export const SERVICE_VERSION = '1.0.0';

const UPLOAD_FIELD = 'file';

export type RouteServices = {
  builds: BuildService;
  analyses: AnalysisService;
  uploads: UploadService;
};

type BuildBody = {
  dockerfile_content: string;
  build_name: string;
  target?: string | null;
  additional_args?: string[] | null;
};

type AnalyzeBody = {
  dockerfile_content: string;
  analysis_type?: string;
};

const buildBodySchema = {
  type: 'object',
  required: ['dockerfile_content', 'build_name'],
  properties: {
    dockerfile_content: { type: 'string' },
    build_name: { type: 'string' },
    target: { type: ['string', 'null'] },
    additional_args: { type: ['array', 'null'], items: { type: 'string' } }
  }
} as const;

const analyzeBodySchema = {
  type: 'object',
  required: ['dockerfile_content'],
  properties: {
    dockerfile_content: { type: 'string' },
    analysis_type: { type: 'string' }
  }
} as const;

export function registerRoutes(app: FastifyInstance, services: RouteServices) {
  app.get('/', async () => ({
    service: `${SERVICE_NAME} Backend`,
    version: SERVICE_VERSION,
    health: '/health',
    status: 'running'
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    service: SERVICE_NAME,
    version: SERVICE_VERSION
  }));

  app.post<{ Body: BuildBody }>('/build', { schema: { body: buildBodySchema } }, async (request) => {
    const body = request.body;
    return services.builds.createBuild({
      buildName: body.build_name,
      sourceContent: body.dockerfile_content,
      target: body.target ?? undefined,
      additionalArgs: body.additional_args ?? undefined
    });
  });

  app.get<{ Params: { id: string } }>('/build/:id', async (request) => {
    return services.builds.getBuild(request.params.id);
  });

  app.get('/builds', async () => {
    const builds = await services.builds.listBuilds();
    return {
      builds: builds.map((b) => ({
        build_id: b.id,
        build_name: b.name,
        target: b.target ?? null,
        additional_args: b.args,
        status: b.status,
        created_at: b.createdAt
      }))
    };
  });

  app.post<{ Body: AnalyzeBody }>('/analyze', { schema: { body: analyzeBodySchema } }, async (request) => {
    return services.analyses.analyze({
      sourceContent: request.body.dockerfile_content,
      analysisType: request.body.analysis_type
    });
  });

  app.post('/upload-build', async (request) => {
    if (!request.isMultipart()) {
      throw new ValidationError('Expected a multipart/form-data body with a file field');
    }
    const file = await request.file();
    if (!file || file.fieldname !== UPLOAD_FIELD) {
      file?.file.resume();
      throw new ValidationError('No file uploaded');
    }
    const body = await file.toBuffer();
    return services.uploads.registerUpload(file.filename, body);
  });
}
