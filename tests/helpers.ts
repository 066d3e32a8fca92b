import type { GenerateRequest, TextProvider } from '../src/llm/types';

export class FakeProvider implements TextProvider {
  requests: GenerateRequest[] = [];
  private replies: string[];
  failWith: Error | null = null;

  constructor(replies: string[] = []) {
    this.replies = [...replies];
  }

  async generate(request: GenerateRequest): Promise<string> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    return this.replies.shift() ?? `reply ${this.requests.length}`;
  }
}

export function multipartBody(
  boundary: string,
  parts: Array<{ name: string; filename?: string; content: Buffer | string }>
): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition = part.filename
      ? `form-data; name="${part.name}"; filename="${part.filename}"`
      : `form-data; name="${part.name}"`;
    const head = part.filename ? `Content-Type: application/octet-stream\r\n` : '';
    chunks.push(Buffer.from(`--${boundary}\r\nContent-Disposition: ${disposition}\r\n${head}\r\n`));
    chunks.push(Buffer.isBuffer(part.content) ? part.content : Buffer.from(part.content));
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`));
  return Buffer.concat(chunks);
}
