import { StorageBackendError, mapUnknownError } from './errors';
import type { BackendUploadResult, FetchLike, StorageBackend, StorageBackendName, UploadInput } from './types';

export type HttpBackendConfig = {
  baseUrl: string;
  /** Bearer token; null disables the backend. */
  token: string | null;
  fetch?: FetchLike;
};

/**
 * Multipart `POST` with a bearer token and a single `file` field. Subclasses
 * name the endpoint and pull the content id out of the response body.
 */
export abstract class HttpUploadBackend implements StorageBackend {
  abstract readonly name: StorageBackendName;
  protected abstract readonly uploadPath: string;

  private readonly baseUrl: string;
  private readonly token: string | null;

  constructor(private readonly config: HttpBackendConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    const token = config.token?.trim() ?? '';
    this.token = token.length > 0 ? token : null;
  }

  /** Content id from a 2xx JSON body, or null when the body lacks one. */
  protected abstract parseContentId(body: unknown): string | null;

  /** Extra multipart fields beyond `file`. */
  protected decorateForm(_form: FormData, _input: UploadInput): void {}

  isEnabled(): boolean {
    return this.token !== null;
  }

  async upload(input: UploadInput, signal: AbortSignal): Promise<BackendUploadResult> {
    if (this.token === null) {
      throw new StorageBackendError({ code: 'DISABLED', backend: this.name, message: 'missing_credential' });
    }

    const form = new FormData();
    form.append('file', new Blob([input.bytes]), input.name);
    this.decorateForm(form, input);

    let res: Response;
    try {
      res = await (this.config.fetch ?? fetch)(`${this.baseUrl}${this.uploadPath}`, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.token}` },
        body: form,
        signal,
      });
    } catch (err) {
      throw mapUnknownError(this.name, err);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new StorageBackendError({
        code: 'UPSTREAM',
        backend: this.name,
        status: res.status,
        message: `http_${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new StorageBackendError({ code: 'INVALID_RESPONSE', backend: this.name, message: 'response_not_json', cause: err });
    }

    const contentId = this.parseContentId(body);
    if (!contentId) {
      throw new StorageBackendError({ code: 'INVALID_RESPONSE', backend: this.name, message: 'content_id_missing' });
    }
    return { contentId };
  }
}
