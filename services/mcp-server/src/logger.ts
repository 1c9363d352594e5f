type LogMeta = Record<string, unknown>;

const SENSITIVE_KEY_PARTS = ["authorization", "token", "key", "secret", "password", "credential"];

// Redact sensitive values from logs
export function redactSensitive(obj: LogMeta): LogMeta {
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEY_PARTS.some((part) => lowerKey.includes(part))) {
      result[key] = "[REDACTED]";
    } else if (Array.isArray(value)) {
      result[key] = value;
    } else if (typeof value === "object" && value !== null) {
      result[key] = redactSensitive(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
}

function format(meta?: LogMeta): string {
  return meta ? JSON.stringify(redactSensitive(meta)) : "";
}

// Instrumentation logger - redacts sensitive info
export const log = {
  info: (msg: string, meta?: LogMeta) => {
    console.log(`[INFO] ${msg}`, format(meta));
  },
  warn: (msg: string, meta?: LogMeta) => {
    console.warn(`[WARN] ${msg}`, format(meta));
  },
  error: (msg: string, meta?: LogMeta) => {
    console.error(`[ERROR] ${msg}`, format(meta));
  },
};
