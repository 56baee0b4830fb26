let debugEnabled = process.env.STATS_DEBUG === "1";
let storeTarget = "unknown";

export function configureLogging({ debug, databaseUrl }: { debug: boolean; databaseUrl: string }) {
  debugEnabled = debug;
  storeTarget = describeStore(databaseUrl);
}

export function isDebugEnabled() {
  return debugEnabled;
}

export function logEvent(event: string, payload: Record<string, unknown> = {}) {
  console.log(`[scoreboard] ${JSON.stringify(envelope(event, payload))}`);
}

export function logDebug(event: string, payload: Record<string, unknown> = {}) {
  if (!debugEnabled) {
    return;
  }

  console.log(`[scoreboard-debug] ${JSON.stringify(envelope(event, payload))}`);
}

export function logError(tag: string, error: unknown) {
  console.error(`[${tag}] unhandled error:`, error);
}

function envelope(event: string, payload: Record<string, unknown>) {
  return {
    ts: new Date().toISOString(),
    pid: process.pid,
    store: storeTarget,
    event,
    ...payload
  };
}

function describeStore(raw: string) {
  if (!raw) {
    return "memory";
  }

  try {
    const parsed = new URL(raw);
    const dbName = parsed.pathname.replace(/^\/+/, "") || "unknown";
    return `${parsed.hostname}:${parsed.port || "5432"}/${dbName}`;
  } catch {
    return "invalid-url";
  }
}
