import { z } from 'zod';

const statusSchema = z.object({
  ready: z.boolean(),
  version: z.string().optional(),
});

const renderSchema = z.object({
  output_path: z.string().min(1),
});

const errorSchema = z.object({
  error: z.object({
    kind: z.enum(['input', 'backend']).default('backend'),
    message: z.string(),
  }),
});

export type BridgeStatus = z.infer<typeof statusSchema>;

export type RenderRequest = {
  job_id: number;
  source_path: string;
  output_path?: string;
  preset?: string;
  tape_type?: string;
};

/** The bridge could not be reached at all (editor not running or crashed). */
export class BridgeUnavailableError extends Error {
  constructor(public readonly code: string, message: string) {
    super(message);
    this.name = 'BridgeUnavailableError';
  }
}

/** The editor is up but not yet able to accept work. */
export class BridgeNotReadyError extends Error {
  constructor(message = 'editor bridge is not ready') {
    super(message);
    this.name = 'BridgeNotReadyError';
  }
}

export class BridgeRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly kind: 'input' | 'backend',
    message: string,
  ) {
    super(message);
    this.name = 'BridgeRequestError';
  }
}

export type FetchLike = typeof fetch;

const UNREACHABLE_CODES = ['ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENOTFOUND', 'EPIPE'];

function causeCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function payload<T>(schema: z.ZodType<T>, body: unknown, path: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BridgeRequestError(200, 'backend', `unexpected editor bridge payload for ${path}`);
  }
  return parsed.data;
}

/**
 * HTTP/JSON client for the editor's automation bridge.
 */
export class EditorBridgeClient {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async status(signal?: AbortSignal): Promise<BridgeStatus> {
    const body = await this.request('GET', '/status', undefined, signal);
    return payload(statusSchema, body, '/status');
  }

  async render(request: RenderRequest, signal?: AbortSignal): Promise<string> {
    const body = await this.request('POST', '/render', request, signal);
    return payload(renderSchema, body, '/render').output_path;
  }

  async abort(jobId: number, signal?: AbortSignal): Promise<void> {
    await this.request('POST', '/abort', { job_id: jobId }, signal);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    payload: unknown,
    signal?: AbortSignal,
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: payload === undefined ? undefined : { 'content-type': 'application/json' },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      const code = causeCode(error);
      if (code && UNREACHABLE_CODES.includes(code)) {
        throw new BridgeUnavailableError(code, `editor bridge unreachable (${code})`);
      }
      throw error;
    }

    if (response.status === 503) {
      throw new BridgeNotReadyError();
    }

    const text = await response.text();
    let body: unknown;
    try {
      body = text.length > 0 ? JSON.parse(text) : {};
    } catch {
      body = undefined;
    }

    if (body === undefined && response.ok) {
      throw new BridgeRequestError(
        response.status,
        'backend',
        `editor bridge returned a non-JSON body for ${path}`,
      );
    }
    if (!response.ok) {
      const parsed = errorSchema.safeParse(body);
      throw new BridgeRequestError(
        response.status,
        parsed.success ? parsed.data.error.kind : response.status < 500 ? 'input' : 'backend',
        parsed.success ? parsed.data.error.message : `editor bridge returned ${response.status}`,
      );
    }
    return body;
  }
}
