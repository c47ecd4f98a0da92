import type { AddressInfo } from "node:net";
import type { Express } from "express";
import type { ApiConfig } from "../../src/config";
import { SegmentationModel, type SegmentationProvider } from "../../src/providers/segmentation-provider";
import { createApiApp } from "../../src/server";

type StartServerInput =
  | { config: ApiConfig; segmentation?: SegmentationProvider | null; now?: () => Date }
  | { app: Express };

/**
 * Starts the API application on an ephemeral port for use in tests.
 *
 * @returns The server's base URL and a function that resolves once the server has shut down
 */
export async function startApiTestServer(input: StartServerInput): Promise<{
  baseUrl: string;
  close: () => Promise<void>;
}> {
  const app =
    "app" in input
      ? input.app
      : createApiApp({
          config: input.config,
          segmentation: new SegmentationModel(input.segmentation ?? null, { model: input.config.segmentationModel }),
          now: input.now || (() => new Date("2026-02-23T00:00:00.000Z"))
        });

  const server = app.listen(0);
  const address = server.address() as AddressInfo;

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    }
  };
}
