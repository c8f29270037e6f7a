import { HttpUploadBackend } from './httpUploadBackend';
import { Web3StorageUploadSchema } from './validation';

export class Web3StorageBackend extends HttpUploadBackend {
  readonly name = 'web3.storage';
  protected readonly uploadPath = '/upload';

  protected parseContentId(body: unknown): string | null {
    const parsed = Web3StorageUploadSchema.safeParse(body);
    return parsed.success ? parsed.data.cid : null;
  }
}
