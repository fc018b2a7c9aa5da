// File: src/api/EfficiencyClient.ts (relative to project root)
import axios from "axios";
import type { AxiosInstance } from "axios";
import { config } from "../config/defaults";
import { DomainError, ShapeError } from "../core/errors";
import type {
  AllocationInstance,
  EfficiencyResponse,
  ImproveResponse,
  InstanceRequest,
  OptimizeResponse,
  StepOptions,
} from "../core/types";
import { ApiErrorBodySchema } from "../core/schemas";
import type { EfficiencyService } from "./EfficiencyService";

export interface EfficiencyClientOptions {
  baseUrl?: string;
  http?: AxiosInstance;
  maxAttempts?: number;
  retryDelayMs?: number; // multiplied by the attempt number
}

/** Simple strongly-typed client for the efficiency API. */
export class EfficiencyClient implements EfficiencyService {
  private readonly base: string;
  private readonly http: AxiosInstance;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: EfficiencyClientOptions = {}) {
    this.base = (options.baseUrl ?? config.API_BASE_URL).replace(/\/+$/, "");
    this.http = options.http ?? axios.create();
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async isParetoEfficient(instance: AllocationInstance): Promise<boolean> {
    const fn = "isParetoEfficient";
    console.log("src/api/EfficiencyClient.ts:%s - checking %s", fn, instance.name ?? "unnamed instance");
    const res = await this.post<EfficiencyResponse>(fn, "/efficiency", toRequest(instance));
    return res.efficient;
  }

  /** One cycle-canceling step on the server; the caller's instance is not modified. */
  async improve(instance: AllocationInstance, options: StepOptions = {}): Promise<ImproveResponse> {
    const fn = "improve";
    console.log("src/api/EfficiencyClient.ts:%s - requesting one step for %s", fn, instance.name ?? "unnamed instance");
    return this.post<ImproveResponse>(fn, "/improve", { ...toRequest(instance), ...options });
  }

  async optimize(instance: AllocationInstance, options: StepOptions & { maxSteps?: number } = {}): Promise<OptimizeResponse> {
    const fn = "optimize";
    console.log("src/api/EfficiencyClient.ts:%s - requesting full run for %s", fn, instance.name ?? "unnamed instance");
    return this.post<OptimizeResponse>(fn, "/optimize", { ...toRequest(instance), ...options });
  }

  private async post<T>(fn: string, path: string, body: InstanceRequest): Promise<T> {
    const url = `${this.base}${path}`;

    // Retry logic for network failures
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const res = await this.http.post<T>(url, body);
        return res.data;
      } catch (error: unknown) {
        lastError = error;
        if (axios.isAxiosError(error) && (error.code === "ECONNRESET" || error.code === "ECONNABORTED")) {
          console.log(
            "src/api/EfficiencyClient.ts:%s - network error attempt %d/%d: %s",
            fn,
            attempt,
            this.maxAttempts,
            error.message
          );
          if (attempt < this.maxAttempts) {
            await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs * attempt));
            continue;
          }
        }
        throw toClientError(error); // Re-throw non-network errors immediately
      }
    }
    throw toClientError(lastError);
  }
}

function toRequest(instance: AllocationInstance): InstanceRequest {
  return { name: instance.name, valuations: instance.valuations, allocations: instance.allocations };
}

/** 400 responses carry the server-side error class; rebuild it so callers can catch it by type. */
function toClientError(error: unknown): unknown {
  if (!axios.isAxiosError(error) || error.response?.status !== 400) {
    return error;
  }
  const body = ApiErrorBodySchema.safeParse(error.response.data);
  if (!body.success) {
    return error;
  }
  switch (body.data.error) {
    case "ShapeError":
      return new ShapeError(body.data.message);
    case "DomainError":
      return new DomainError(body.data.message);
    default:
      return error;
  }
}
