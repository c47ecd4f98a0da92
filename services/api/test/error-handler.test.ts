import { PayloadTooLargeError, ProcessingError } from "@filedesk/core";
import type { NextFunction, Request, Response } from "express";
import { afterEach, describe, expect, it, vi } from "vitest";
import * as logModule from "../src/lib/log";
import { errorHandler } from "../src/server";

type MockResponse = Pick<Response, "headersSent" | "status" | "json">;

function createMockResponse(headersSent: boolean): MockResponse {
  return {
    headersSent,
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis()
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("errorHandler", () => {
  it("returns a generic 500 envelope and logs full error details", () => {
    const logSpy = vi.spyOn(logModule, "logError").mockImplementation(() => {});
    const response = createMockResponse(false);
    const next = vi.fn() as NextFunction;
    const error = new Error("sensitive failure details at /srv/data/uploads");

    errorHandler(error, {} as Request, response as Response, next);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      code: "INTERNAL",
      message: "An unexpected error occurred."
    });
    expect(logSpy).toHaveBeenCalledWith(
      "api.error",
      expect.objectContaining({
        error: expect.objectContaining({
          name: "Error",
          message: "sensitive failure details at /srv/data/uploads",
          stack: expect.any(String)
        })
      })
    );
    expect(next).not.toHaveBeenCalled();
  });

  it("renders application errors at their own status", () => {
    const response = createMockResponse(false);
    const next = vi.fn() as NextFunction;

    errorHandler(new PayloadTooLargeError(1024), {} as Request, response as Response, next);

    expect(response.status).toHaveBeenCalledWith(413);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      code: "FILE_TOO_LARGE",
      message: "Maximum upload size is 1024 bytes."
    });
  });

  it("answers processing failures with status 200", () => {
    const response = createMockResponse(false);
    const next = vi.fn() as NextFunction;

    errorHandler(new ProcessingError("Failed to split PDF: bad xref"), {} as Request, response as Response, next);

    expect(response.status).toHaveBeenCalledWith(200);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      code: "PROCESSING_FAILED",
      message: "Failed to split PDF: bad xref"
    });
  });

  it("answers body parser failures as client errors", () => {
    const logSpy = vi.spyOn(logModule, "logError").mockImplementation(() => {});
    const parseFailure = Object.assign(new SyntaxError("Unexpected token } in JSON"), {
      type: "entity.parse.failed",
      status: 400
    });
    const tooLarge = Object.assign(new Error("request entity too large"), { type: "entity.too.large", status: 413 });

    const malformed = createMockResponse(false);
    errorHandler(parseFailure, {} as Request, malformed as Response, vi.fn() as NextFunction);
    expect(malformed.status).toHaveBeenCalledWith(400);
    expect(malformed.json).toHaveBeenCalledWith({ success: false, code: "VALIDATION_ERROR", message: "Malformed JSON body" });

    const oversized = createMockResponse(false);
    errorHandler(tooLarge, {} as Request, oversized as Response, vi.fn() as NextFunction);
    expect(oversized.status).toHaveBeenCalledWith(413);
    expect(oversized.json).toHaveBeenCalledWith({
      success: false,
      code: "FILE_TOO_LARGE",
      message: "Maximum upload size is 1048576 bytes."
    });
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("delegates to next when headers are already sent", () => {
    const logSpy = vi.spyOn(logModule, "logError").mockImplementation(() => {});
    const response = createMockResponse(true);
    const next = vi.fn() as NextFunction;
    const error = new Error("late failure");

    errorHandler(error, {} as Request, response as Response, next);

    expect(next).toHaveBeenCalledWith(error);
    expect(response.status).not.toHaveBeenCalled();
    expect(response.json).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("logs non-Error values safely", () => {
    const logSpy = vi.spyOn(logModule, "logError").mockImplementation(() => {});
    const response = createMockResponse(false);
    const next = vi.fn() as NextFunction;
    const nonError = { reason: "boom" };

    errorHandler(nonError, {} as Request, response as Response, next);

    expect(logSpy).toHaveBeenCalledWith("api.error", { error: { value: nonError } });
    expect(response.status).toHaveBeenCalledWith(500);
    expect(next).not.toHaveBeenCalled();
  });
});
