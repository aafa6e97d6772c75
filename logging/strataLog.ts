/**
 * Structured logging for analysis pipeline events.
 *
 * Emits one JSON object per line. Level is read from STRATA_LOG_LEVEL
 * (debug | info | warn | silent), default info.
 */

export type StrataLogEvent =
  | "framebook.loaded"
  | "framebook.warning"
  | "document.prepared"
  | "pass.analyze.completed"
  | "analysis.completed"
  | "analysis.failed"
  | "diagnostic.recorded";

export type StrataLogLevel = "debug" | "info" | "warn" | "silent";

export type StrataLogData = {
  event: StrataLogEvent;
  doc_id?: string;
  module?: string;
  annotation_count?: number;
  duration_ms?: number;
  code?: string;
  message?: string;
  [key: string]: unknown;
};

const LEVEL_RANK: Record<StrataLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  silent: 3,
};

function currentLevel(): StrataLogLevel {
  const raw = process.env.STRATA_LOG_LEVEL?.toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "silent") {
    return raw;
  }
  return "info";
}

export function strataLog(
  data: StrataLogData,
  level: Exclude<StrataLogLevel, "silent"> = "info"
): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel()]) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    ...data,
  };

  const line = JSON.stringify(logEntry);
  if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const strataLogHelpers = {
  passCompleted(params: {
    doc_id: string;
    module: string;
    annotation_count: number;
    duration_ms: number;
  }): void {
    strataLog(
      {
        event: "pass.analyze.completed",
        doc_id: params.doc_id,
        module: params.module,
        annotation_count: params.annotation_count,
        duration_ms: params.duration_ms,
      },
      "debug"
    );
  },

  analysisCompleted(params: {
    doc_id: string;
    annotation_count: number;
    duration_ms: number;
  }): void {
    strataLog({
      event: "analysis.completed",
      doc_id: params.doc_id,
      annotation_count: params.annotation_count,
      duration_ms: params.duration_ms,
    });
  },

  analysisFailed(params: { doc_id: string; message: string }): void {
    strataLog(
      {
        event: "analysis.failed",
        doc_id: params.doc_id,
        message: params.message,
      },
      "warn"
    );
  },
};
