import { logger } from '../observability/logger';
import type { IdGenerator } from '../storage/ids';
import type { UploadResponse } from './types';

/** Accepts an uploaded build file and reports its size; the body is dropped. */
export class UploadService {
  constructor(private ids: IdGenerator) {}

  registerUpload(filename: string, body: Buffer): UploadResponse {
    const id = this.ids.next('uploaded');
    logger.info('file uploaded', { id, filename, size: body.length });
    return {
      message: 'File uploaded successfully',
      filename,
      file_id: id,
      size: body.length
    };
  }
}
