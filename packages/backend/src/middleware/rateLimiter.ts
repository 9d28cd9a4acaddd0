import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";
import { appConfig } from "../config.js";

function createRateLimiter(max: number, error: string): RateLimitRequestHandler {
  return rateLimit({
    windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error }
  });
}

export const apiRateLimiter = createRateLimiter(appConfig.RATE_LIMIT_MAX, "Too many requests");

// Routes that reach the language model share its per-minute budget.
export const modelRateLimiter = createRateLimiter(
  appConfig.LLM_REQUESTS_PER_MINUTE,
  "Too many model requests; try again shortly"
);
