import OpenAI, { AzureOpenAI } from "openai";
import nodeFetch, { Headers, Response } from "node-fetch";
import type { RequestInfo, RequestInit } from "node-fetch";
import type { BackendConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import type {
  BackendChunk,
  BackendRequest,
  BackendResponse,
  BackendStreamRequest,
} from "../types/openai.js";
import {
  PipelineError,
  backendErrorMessage,
  isRecord,
  translateBackendError,
} from "./errorTranslator.js";

export interface CallOptions {
  requestId: string;
  signal?: AbortSignal;
}

/** Backend seam used by the pipeline. Failures surface as PipelineError. */
export interface BackendClient {
  readonly baseUrl: string;
  readonly apiType: BackendConfig["apiType"];
  complete(body: BackendRequest, options: CallOptions): Promise<BackendResponse>;
  /**
   * Resolves once the backend has accepted the request; the returned sequence yields
   * fragments in arrival order and can be consumed once.
   */
  stream(body: BackendStreamRequest, options: CallOptions): Promise<AsyncGenerator<BackendChunk>>;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * The SDK only reads `error` from an error body. Bodies from servers that put the message
 * elsewhere (vLLM, FastAPI) are rewritten to `{ error: { message } }` so it survives.
 */
export async function backendFetch(url: RequestInfo, init?: RequestInit): Promise<Response> {
  const response = await nodeFetch(url, init);
  if (response.ok) return response;

  const text = await response.clone().text();
  const body = parseJson(text);
  if (isRecord(body) && isRecord(body.error)) return response;

  const message = backendErrorMessage(body);
  if (message === undefined) return response;

  const headers = new Headers(response.headers);
  headers.delete("content-length");
  return new Response(JSON.stringify({ error: { message } }), {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

function createSdkClient(backend: BackendConfig): OpenAI {
  if (backend.apiType === "azure") {
    return new AzureOpenAI({
      apiKey: backend.apiKey,
      endpoint: backend.baseUrl,
      apiVersion: backend.azureApiVersion,
      maxRetries: 0,
      fetch: backendFetch,
    });
  }
  return new OpenAI({
    apiKey: backend.apiKey,
    baseURL: backend.baseUrl,
    maxRetries: 0,
    fetch: backendFetch,
  });
}

export class OpenAIBackendClient implements BackendClient {
  readonly baseUrl: string;
  readonly apiType: BackendConfig["apiType"];
  private readonly client: OpenAI;

  constructor(backend: BackendConfig, client?: OpenAI) {
    this.baseUrl = backend.baseUrl;
    this.apiType = backend.apiType;
    this.client = client ?? createSdkClient(backend);
  }

  async complete(body: BackendRequest, options: CallOptions): Promise<BackendResponse> {
    logger.info({
      action: "backend_call",
      requestId: options.requestId,
      model: body.model,
      baseUrl: this.baseUrl,
      stream: false,
    });

    try {
      return await this.client.chat.completions.create(body, { signal: options.signal });
    } catch (err) {
      throw new PipelineError(translateBackendError(err, options.signal));
    }
  }

  async stream(
    body: BackendStreamRequest,
    options: CallOptions,
  ): Promise<AsyncGenerator<BackendChunk>> {
    const { signal } = options;
    logger.info({
      action: "backend_call",
      requestId: options.requestId,
      model: body.model,
      baseUrl: this.baseUrl,
      stream: true,
    });

    const sdkStream = await this.open(body, signal);

    async function* fragments(): AsyncGenerator<BackendChunk> {
      let finished = false;
      try {
        for await (const chunk of sdkStream) {
          yield chunk;
        }
        finished = true;
      } catch (err) {
        throw new PipelineError(translateBackendError(err, signal));
      } finally {
        // Consumer stopped early: drop the backend connection.
        if (!finished) sdkStream.controller.abort();
      }
      // The SDK ends the iteration quietly when aborted mid-read.
      if (signal?.aborted) {
        throw new PipelineError(translateBackendError(signal.reason, signal));
      }
    }

    return fragments();
  }

  private async open(body: BackendStreamRequest, signal: AbortSignal | undefined) {
    try {
      return await this.client.chat.completions.create(body, { signal });
    } catch (err) {
      throw new PipelineError(translateBackendError(err, signal));
    }
  }
}
