import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

const REQUEST_ID_HEADER = "x-request-id";

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = process.hrtime.bigint();
  const incoming = req.headers[REQUEST_ID_HEADER];
  const requestId = typeof incoming === "string" && incoming.length > 0 ? incoming : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;
    const fields = {
      requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs * 10) / 10
    };

    if (res.statusCode >= 500) {
      logger.error(fields, "HTTP request failed");
    } else if (res.statusCode >= 400) {
      logger.warn(fields, "HTTP request rejected");
    } else {
      logger.info(fields, "HTTP request");
    }
  });

  next();
};
