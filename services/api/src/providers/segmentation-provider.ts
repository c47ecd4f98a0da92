import { ProcessingError } from "@filedesk/core";
import CircuitBreaker from "opossum";
import { z } from "zod";

export type SegmentationInput = {
  bytes: Buffer;
  contentType: string;
};

/**
 * Instance segmentation backend. Each mask is a single-image PNG where
 * bright pixels belong to the instance; masks may be smaller than the input.
 */
export interface SegmentationProvider {
  load(model: string): Promise<void>;
  segment(input: SegmentationInput): Promise<Buffer[]>;
}

const segmentResponseSchema = z.object({
  masks: z.array(z.string().min(1))
});

function authorizationHeader(apiKey: string | undefined): Record<string, string> {
  return apiKey ? { authorization: `Bearer ${apiKey}` } : {};
}

export class HttpSegmentationProvider implements SegmentationProvider {
  private readonly breaker: CircuitBreaker<[Buffer, string], Buffer[]>;

  constructor(
    private readonly config: {
      endpointUrl: string;
      apiKey?: string;
      model: string;
      timeoutMs: number;
      onCircuitStateChange?: (state: "open" | "halfOpen" | "close") => void;
    }
  ) {
    this.breaker = new CircuitBreaker<[Buffer, string], Buffer[]>(
      async (bytes, contentType) => this.callSegment(bytes, contentType),
      {
        timeout: config.timeoutMs,
        errorThresholdPercentage: 50,
        resetTimeout: 60000,
        volumeThreshold: 5
      }
    );
    this.breaker.on("open", () => this.config.onCircuitStateChange?.("open"));
    this.breaker.on("halfOpen", () => this.config.onCircuitStateChange?.("halfOpen"));
    this.breaker.on("close", () => this.config.onCircuitStateChange?.("close"));
  }

  private endpoint(pathname: string): string {
    return `${this.config.endpointUrl.replace(/\/+$/, "")}${pathname}`;
  }

  async load(model: string): Promise<void> {
    const response = await fetch(this.endpoint("/models/load"), {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...authorizationHeader(this.config.apiKey)
      },
      body: JSON.stringify({ model }),
      signal: AbortSignal.timeout(this.config.timeoutMs)
    });

    if (!response.ok) {
      throw new Error(`Segmentation model ${model} failed to load with status ${response.status}`);
    }
  }

  private async callSegment(bytes: Buffer, contentType: string): Promise<Buffer[]> {
    const url = `${this.endpoint("/segment")}?model=${encodeURIComponent(this.config.model)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "content-type": contentType,
        ...authorizationHeader(this.config.apiKey)
      },
      body: bytes,
      signal: AbortSignal.timeout(this.config.timeoutMs)
    });

    if (!response.ok) {
      throw new Error(`Segmentation provider returned status ${response.status}`);
    }

    const parsed = segmentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Segmentation provider returned an invalid response");
    }

    return parsed.data.masks.map((mask) => Buffer.from(mask, "base64"));
  }

  async segment(input: SegmentationInput): Promise<Buffer[]> {
    return this.breaker.fire(input.bytes, input.contentType);
  }
}

/**
 * Process-wide handle on the segmentation model. The first caller triggers the
 * load; concurrent callers share it. A failed load is retried by the next caller.
 */
export class SegmentationModel {
  private loading: Promise<SegmentationProvider> | null = null;

  constructor(
    private readonly provider: SegmentationProvider | null,
    private readonly options: {
      model: string;
      onLoaded?: (payload: { model: string; durationMs: number }) => void;
      now?: () => number;
    }
  ) {}

  get configured(): boolean {
    return this.provider !== null;
  }

  ensureLoaded(): Promise<SegmentationProvider> {
    const provider = this.provider;
    if (!provider) {
      return Promise.reject(new ProcessingError("Background removal is not configured"));
    }

    if (!this.loading) {
      const now = this.options.now || (() => Date.now());
      const startedAt = now();
      this.loading = provider.load(this.options.model).then(
        () => {
          this.options.onLoaded?.({ model: this.options.model, durationMs: now() - startedAt });
          return provider;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  async segment(input: SegmentationInput): Promise<Buffer[]> {
    const provider = await this.ensureLoaded();
    return provider.segment(input);
  }
}
