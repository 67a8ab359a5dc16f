// backend/src/utils/logger.ts

type LogFields = Record<string, string | number | boolean | undefined>;

function truncate(msg: string): string {
  return msg.length > 500 ? `${msg.slice(0, 500)}…` : msg;
}

// One JSON line per event, undefined fields dropped by JSON.stringify.
export function logInfo(msg: string, fields: LogFields = {}) {
  console.log(JSON.stringify({ level: "info", msg, ...fields }));
}

export function logWarn(msg: string, fields: LogFields = {}) {
  console.warn(JSON.stringify({ level: "warn", msg, ...fields }));
}

export function logServerError(context: string, err: unknown, requestId?: string) {
  const rid = typeof requestId === "string" && requestId.trim() ? requestId.trim() : undefined;
  const name = err instanceof Error && err.name ? err.name : undefined;
  const msg = err instanceof Error ? err.message : String(err || "unknown error");

  console.error(
    JSON.stringify({
      level: "error",
      msg: context,
      requestId: rid,
      errorName: name,
      error: truncate(msg),
    })
  );
}
