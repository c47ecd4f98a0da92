import { randomUUID } from "node:crypto";
import { AppError, NotFoundError, PayloadTooLargeError, ValidationError, type ResponseEnvelope } from "@filedesk/core";
import cors from "cors";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import { loadApiConfig, type ApiConfig } from "./config";
import { formatErrorForLog, logError, logInfo } from "./lib/log";
import { HttpSegmentationProvider, SegmentationModel } from "./providers/segmentation-provider";
import { createToolRegistry, type ToolRegistry } from "./registry";
import { registerOutputRoutes } from "./routes/outputs";
import { registerToolRoutes } from "./routes/tools";
import { registerVideoRoutes } from "./routes/video";
import { FileSystemOutputStore, type OutputStore } from "./services/output-store";
import { UploadValidator } from "./services/upload-validator";
import { startOutputSweeper } from "./sweeper";

export type ApiDependencies = {
  config: ApiConfig;
  outputStore: OutputStore;
  validator: UploadValidator;
  registry: ToolRegistry;
  segmentation: SegmentationModel;
  now: () => Date;
};

export type ApiRuntime = {
  app: Express;
  deps: ApiDependencies;
};

const INTERNAL_ERROR_MESSAGE = "An unexpected error occurred.";
const HEALTH_MESSAGE = "File tools API is running";
const REQUEST_ID_MAX_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;
const JSON_BODY_LIMIT_BYTES = 1024 * 1024;

// body-parser tags its failures with a `type` such as "entity.parse.failed".
function bodyParserErrorType(error: unknown): string | null {
  return error instanceof Error && "type" in error && typeof error.type === "string" ? error.type : null;
}

function toAppError(error: unknown): AppError | null {
  if (error instanceof AppError) {
    return error;
  }
  switch (bodyParserErrorType(error)) {
    case "entity.parse.failed":
      return new ValidationError("Malformed JSON body");
    case "entity.too.large":
      return new PayloadTooLargeError(JSON_BODY_LIMIT_BYTES);
    default:
      return null;
  }
}

function createSegmentationModel(config: ApiConfig): SegmentationModel {
  const provider = config.segmentationApiUrl
    ? new HttpSegmentationProvider({
        endpointUrl: config.segmentationApiUrl,
        apiKey: config.segmentationApiKey,
        model: config.segmentationModel,
        timeoutMs: config.segmentationTimeoutMs,
        onCircuitStateChange: (state) => {
          logInfo("segmentation.circuit", { state });
        }
      })
    : null;

  return new SegmentationModel(provider, {
    model: config.segmentationModel,
    onLoaded: (payload) => {
      logInfo("segmentation.loaded", payload);
    }
  });
}

export function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const appError = toAppError(error);
  if (appError) {
    const envelope: ResponseEnvelope = { success: false, code: appError.code, message: appError.message };
    res.status(appError.status).json(envelope);
    return;
  }

  logError("api.error", { error: formatErrorForLog(error) });
  const envelope: ResponseEnvelope = { success: false, code: "INTERNAL", message: INTERNAL_ERROR_MESSAGE };
  res.status(500).json(envelope);
}

export function createApiRuntime(incomingDeps?: Partial<ApiDependencies>): ApiRuntime {
  const config = incomingDeps?.config || loadApiConfig();
  const now = incomingDeps?.now || (() => new Date());

  const deps: ApiDependencies = {
    config,
    outputStore:
      incomingDeps?.outputStore ||
      new FileSystemOutputStore({
        outputDir: config.outputDir,
        urlPrefix: config.outputUrlPrefix,
        ttlMinutes: config.outputTtlMinutes,
        now
      }),
    validator:
      incomingDeps?.validator ||
      new UploadValidator({ scratchDir: config.scratchDir, maxUploadBytes: config.maxUploadBytes }),
    registry: incomingDeps?.registry || createToolRegistry({ maxFiles: config.maxFilesPerRequest }),
    segmentation: incomingDeps?.segmentation || createSegmentationModel(config),
    now
  };

  const app = express();
  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const incomingRequestId = req.header("x-request-id")?.trim();
    const requestId =
      incomingRequestId && incomingRequestId.length <= REQUEST_ID_MAX_LENGTH && REQUEST_ID_PATTERN.test(incomingRequestId)
        ? incomingRequestId
        : randomUUID();
    res.setHeader("X-Request-ID", requestId);
    next();
  });

  app.use(
    cors({
      origin: deps.config.webOrigin,
      exposedHeaders: ["X-Request-ID"]
    })
  );
  app.use(express.json({ limit: JSON_BODY_LIMIT_BYTES }));

  app.use((req, res, next) => {
    const startedAtNs = process.hrtime.bigint();
    res.on("finish", () => {
      logInfo("api.request.completed", {
        requestId: res.getHeader("X-Request-ID"),
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Number(process.hrtime.bigint() - startedAtNs) / 1_000_000
      });
    });
    next();
  });

  app.use(
    "/api",
    rateLimit({
      windowMs: deps.config.apiRateLimitWindowMs,
      limit: deps.config.apiRateLimitMax,
      skip: (req) => req.method === "GET",
      handler: (_req, res) => {
        const envelope: ResponseEnvelope = {
          success: false,
          code: "RATE_LIMITED",
          message: "Too many requests. Retry later."
        };
        res.status(429).json(envelope);
      },
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.get("/api/health", (_req, res) => {
    res.json({ status: "healthy", message: HEALTH_MESSAGE });
  });

  registerOutputRoutes(app, { config: deps.config, outputStore: deps.outputStore });
  registerVideoRoutes(app);
  registerToolRoutes(app, {
    config: deps.config,
    registry: deps.registry,
    validator: deps.validator,
    context: { outputStore: deps.outputStore, segmentation: deps.segmentation }
  });

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });
  app.use(errorHandler);
  return { app, deps };
}

export function createApiApp(incomingDeps?: Partial<ApiDependencies>): Express {
  return createApiRuntime(incomingDeps).app;
}

if (require.main === module) {
  const config = loadApiConfig();
  const runtime = createApiRuntime({ config });
  const stopSweeper = startOutputSweeper({
    outputStore: runtime.deps.outputStore,
    scratchDir: config.scratchDir,
    scratchTtlMs: config.outputTtlMinutes * 60 * 1000,
    intervalMs: config.outputSweepIntervalMs,
    onSweep: (payload) => {
      logInfo(payload.event, payload);
    },
    onError: (error) => {
      logError("output.sweep.failed", { error: formatErrorForLog(error) });
    }
  });

  const server = runtime.app.listen(config.port, () => {
    logInfo("api.started", {
      port: config.port,
      outputDir: config.outputDir,
      segmentationConfigured: runtime.deps.segmentation.configured
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo("api.stopping", { signal });
    stopSweeper();

    let exitCode = 0;
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    } catch (error) {
      exitCode = 1;
      logError("api.shutdown.server_close_failed", { error: formatErrorForLog(error) });
    }

    process.exit(exitCode);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}
