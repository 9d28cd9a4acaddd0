import type { RequestHandler } from "express";
import type { ZodIssue, ZodTypeAny } from "zod";

type RequestPart = "params" | "query" | "body";

export type ValidationSchemas = Partial<Record<RequestPart, ZodTypeAny>>;

export interface ValidationIssue {
  location: RequestPart;
  path: string;
  message: string;
}

const requestParts: RequestPart[] = ["params", "query", "body"];

/**
 * Parses each configured request part in place. Issues from every part are
 * collected so a client sees all problems with one request.
 */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    const issues: ValidationIssue[] = [];

    for (const part of requestParts) {
      const schema = schemas[part];
      if (!schema) {
        continue;
      }

      const result = schema.safeParse(req[part]);
      if (!result.success) {
        issues.push(...result.error.issues.map((issue) => toValidationIssue(part, issue)));
        continue;
      }

      if (part === "body") {
        req.body = result.data;
      } else if (part === "query") {
        req.query = result.data;
      } else {
        req.params = result.data;
      }
    }

    if (issues.length > 0) {
      return res.status(400).json({ error: "Validation failed", details: issues });
    }
    return next();
  };
};

function toValidationIssue(location: RequestPart, issue: ZodIssue): ValidationIssue {
  return {
    location,
    path: issue.path.join("."),
    message: issue.message
  };
}
