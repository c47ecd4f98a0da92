import { NotImplementedError, UnknownOperationError, isVideoOperation } from "@filedesk/core";
import type { Router } from "express";

/**
 * Video endpoints are reserved but not implemented; each answers 501.
 * Registered ahead of the generic tool route so uploads are never buffered.
 */
export function registerVideoRoutes(router: Router): void {
  router.post("/api/video/:operation", (req, _res, next) => {
    const operation = req.params.operation;
    if (!isVideoOperation(operation)) {
      next(new UnknownOperationError("video", operation));
      return;
    }
    next(new NotImplementedError(`Video ${operation} is not implemented yet`));
  });
}
