import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  name: "finscope",
  level: appConfig.NODE_ENV === "test" ? "silent" : appConfig.LOG_LEVEL,
  redact: {
    paths: ["apiKey", "*.apiKey", "password", "*.password", "req.headers.authorization"],
    censor: "[redacted]"
  },
  serializers: {
    err: pino.stdSerializers.err
  }
});
