import type { ExtractionRecord } from "./extract/poller.js";

export function formatRecordLine(record: ExtractionRecord): string {
  return `${JSON.stringify({
    index: record.index,
    status: record.status,
    success: record.success,
    hovered: record.hovered,
    fields: record.fields,
  })}\n`;
}
