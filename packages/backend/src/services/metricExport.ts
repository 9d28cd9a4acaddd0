import type { ExtractedMetric, MetricExportRow } from "@finscope/shared";
import { formatNormalizedValue } from "./metricNormalization.js";

export const EXPORT_COLUMNS = ["document", "metric", "value", "unit", "page", "status"] as const;

export function toExportRows(
  metrics: ExtractedMetric[],
  titles: ReadonlyMap<string, string> = new Map()
): MetricExportRow[] {
  return metrics.map((metric) => {
    const pages = [...new Set(metric.citations.map((citation) => citation.pageNumber))].sort((a, b) => a - b);
    return {
      document: titles.get(metric.documentId) ?? metric.citations[0]?.documentTitle ?? metric.documentId,
      metric: metric.period ? `${metric.metric} (${metric.period})` : metric.metric,
      value: metric.normalized ? formatNormalizedValue(metric.normalized) : (metric.rawValue ?? ""),
      unit: metric.normalized?.type === "number" ? metric.normalized.unit : "",
      page: pages.join(";"),
      status: metric.status
    };
  });
}

/** RFC 4180: CRLF line breaks, fields quoted when they hold a comma, quote or line break. */
export function toCsv(rows: MetricExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(EXPORT_COLUMNS.map((column) => escapeCsvField(row[column])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

export function toJson(rows: MetricExportRow[]): string {
  return JSON.stringify(rows, null, 2);
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
