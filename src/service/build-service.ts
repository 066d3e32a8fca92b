import { NotFoundError } from '../core/errors';
import { logger } from '../observability/logger';
import type { IdGenerator } from '../storage/ids';
import type { RecordStore } from '../storage/record-store';
import type { BuildRecord, BuildRequest, BuildResponse } from './types';

export class BuildService {
  constructor(
    private store: RecordStore<BuildRecord>,
    private ids: IdGenerator
  ) {}

  // Nothing executes the build yet; records stay `running`.
  async createBuild(req: BuildRequest): Promise<BuildResponse> {
    const id = this.ids.next('build');
    await this.store.put(id, {
      id,
      name: req.buildName,
      sourceContent: req.sourceContent,
      target: req.target,
      args: req.additionalArgs ?? [],
      status: 'running',
      createdAt: new Date().toISOString()
    });
    logger.info('build created', { id, name: req.buildName });
    return {
      success: true,
      build_id: id,
      message: `Build '${req.buildName}' has been queued for execution`,
      output: null
    };
  }

  async getBuild(id: string): Promise<BuildResponse> {
    const build = await this.store.get(id);
    if (!build) {
      throw new NotFoundError(`Build ${id} not found`);
    }
    return {
      success: build.status === 'completed',
      build_id: id,
      message: `Build status: ${build.status}`,
      output: null
    };
  }

  async listBuilds(): Promise<BuildRecord[]> {
    const entries = await this.store.list();
    return entries.map((e) => e.record);
  }
}
