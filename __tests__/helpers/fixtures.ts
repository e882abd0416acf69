import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import type { EmbeddingProvider } from "../../src/services/knowledge/types";

/**
 * Embedding provider backed by a lookup table. Unknown texts get a
 * deterministic vector derived from their characters.
 */
export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];
  private failure: Error | null = null;

  constructor(
    private readonly dimension: number,
    private readonly vectors: Record<string, number[]> = {}
  ) {}

  set(text: string, vector: number[]): void {
    this.vectors[text] = vector;
  }

  failWith(error: Error | null): void {
    this.failure = error;
  }

  async getEmbedding(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failure) throw this.failure;
    return this.vectors[text] ?? charVector(text, this.dimension);
  }

  getDimension(): number {
    return this.dimension;
  }
}

export function charVector(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (let i = 0; i < text.length; i++) {
    vector[i % dimension] += text.charCodeAt(i) / 1000;
  }
  return vector;
}

export function unitVector(dimension: number, hot: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  vector[hot] = 1;
  return vector;
}

export function makeTmpDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `support-${label}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface RecordedRequest {
  method?: string;
  url?: string;
  params?: unknown;
  headers: Record<string, unknown>;
  data?: unknown;
  timeout?: number;
}

/**
 * Axios adapter that answers every request with `respond`, recording what was
 * sent. Throwing from `respond` rejects the request as a network error would.
 */
export function fakeAdapter(
  respond: (request: RecordedRequest) => { status: number; data: unknown },
  requests: RecordedRequest[] = []
): AxiosAdapter {
  return async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const request: RecordedRequest = {
      method: config.method,
      url: config.url,
      params: config.params,
      headers: config.headers.toJSON(),
      data: typeof config.data === "string" ? JSON.parse(config.data) : config.data,
      timeout: config.timeout,
    };
    requests.push(request);
    const { status, data } = respond(request);
    const response: AxiosResponse = { status, statusText: String(status), headers: {}, config, data };
    const validate = config.validateStatus;
    if (validate && !validate(status)) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  };
}
