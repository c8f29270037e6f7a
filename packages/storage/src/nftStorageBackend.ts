import { HttpUploadBackend } from './httpUploadBackend';
import { NftStorageUploadSchema } from './validation';

export class NftStorageBackend extends HttpUploadBackend {
  readonly name = 'nft.storage';
  protected readonly uploadPath = '/upload';

  protected parseContentId(body: unknown): string | null {
    const parsed = NftStorageUploadSchema.safeParse(body);
    if (!parsed.success || parsed.data.ok === false) return null;
    return parsed.data.value.cid;
  }
}
