import { HttpUploadBackend } from './httpUploadBackend';
import type { UploadInput } from './types';
import { PinataPinSchema } from './validation';

export class PinataBackend extends HttpUploadBackend {
  readonly name = 'pinata';
  protected readonly uploadPath = '/pinning/pinFileToIPFS';

  protected override decorateForm(form: FormData, input: UploadInput): void {
    form.append('pinataMetadata', JSON.stringify({ name: input.name, keyvalues: input.metadata ?? {} }));
    form.append('pinataOptions', JSON.stringify({ cidVersion: 1 }));
  }

  protected parseContentId(body: unknown): string | null {
    const parsed = PinataPinSchema.safeParse(body);
    return parsed.success ? parsed.data.IpfsHash : null;
  }
}
