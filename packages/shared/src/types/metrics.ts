import type { Citation } from "./query.js";

export const METRIC_KINDS = ["currency", "percentage", "date", "count"] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

export interface MetricBounds {
  min?: number;
  max?: number;
}

export interface MetricSpec {
  name: string;
  kind: MetricKind;
  period?: string;
  description?: string;
  bounds?: MetricBounds;
  /** Expected ISO currency code for currency metrics, e.g. "USD". */
  unit?: string;
}

export type NormalizedValue =
  | { type: "number"; value: number; unit: string }
  | { type: "date"; value: string }
  | { type: "string"; value: string };

export type RejectionReason = "type_mismatch" | "out_of_range" | "ungrounded" | "not_found";

export type MetricStatus = "valid" | "unverified" | `rejected:${RejectionReason}`;

export interface ExtractedMetric {
  id: string;
  documentId: string;
  metric: string;
  kind: MetricKind;
  period?: string;
  rawValue: string | null;
  normalized: NormalizedValue | null;
  citations: Citation[];
  status: MetricStatus;
  notes: string[];
}

export interface MetricExportRow {
  document: string;
  metric: string;
  value: string;
  unit: string;
  page: string;
  status: MetricStatus;
}

export type ExportFormat = "csv" | "json";
