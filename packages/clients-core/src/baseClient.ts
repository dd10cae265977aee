import axios, { type AxiosRequestConfig } from "axios";
import type { ErrorResponse } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
}

/**
 * A failed request. When the server answered with a ModelError body,
 * `cause` holds the name of the model error behind it.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number | undefined,
    public readonly causeName: string | undefined,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorResponse(data: unknown): data is ErrorResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "error" in data &&
    data.error === "ModelError" &&
    "message" in data &&
    typeof data.message === "string" &&
    "cause" in data &&
    typeof data.cause === "string"
  );
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 10000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  /** Unwrap the response body, turning HTTP failures into ApiError */
  protected async send<T>(request: Promise<{ data: T }>): Promise<T> {
    try {
      const response = await request;
      return response.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const data: unknown = err.response?.data;
        if (isErrorResponse(data)) {
          throw new ApiError(data.message, err.response?.status, data.cause);
        }
        throw new ApiError(err.message, err.response?.status, undefined);
      }
      throw err;
    }
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.get<T>(this.buildPath(params), this.buildConfig(params)));
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.post<T>(this.buildPath(params), params.body, this.buildConfig(params)));
  }

  public async put<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.put<T>(this.buildPath(params), params.body, this.buildConfig(params)));
  }

  public async patch<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.patch<T>(this.buildPath(params), params.body, this.buildConfig(params)));
  }

  public async delete<T>(params: RequestParams = {}): Promise<T> {
    return this.send(axios.delete<T>(this.buildPath(params), this.buildConfig(params)));
  }
}
