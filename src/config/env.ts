import { ConfigError } from "../errors.js";
import type { SinkConfig } from "../types/config.js";
import { parseLogLevel } from "../types/log-level.js";
import { parseOutputTarget } from "../types/output-target.js";

type EnvError = { field: string; message: string };

/**
 * Read sink configuration from DRAINLOG_* variables.
 * Unset variables are left out so resolveSinkConfig applies its defaults.
 */
export function loadSinkConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SinkConfig {
  const errors: EnvError[] = [];
  const config: SinkConfig = {};

  const optionalBool = (key: string): boolean | undefined => {
    const v = env[key];
    if (!v) return undefined;
    if (v === "true" || v === "1") return true;
    if (v === "false" || v === "0") return false;
    errors.push({ field: key, message: `must be "true" or "false", got "${v}"` });
    return undefined;
  };

  const level = env.DRAINLOG_LEVEL;
  if (level) {
    config.level = parseLogLevel(level);
    if (config.level === undefined) {
      errors.push({ field: "DRAINLOG_LEVEL", message: `unknown level "${level}"` });
    }
  }

  const target = env.DRAINLOG_TARGET;
  if (target) {
    config.target = parseOutputTarget(target);
    if (config.target === undefined) {
      errors.push({ field: "DRAINLOG_TARGET", message: `must be console, file or both, got "${target}"` });
    }
  }

  if (env.DRAINLOG_TEMPLATE) config.template = env.DRAINLOG_TEMPLATE;
  if (env.DRAINLOG_FILE) config.filePath = env.DRAINLOG_FILE;
  config.append = optionalBool("DRAINLOG_APPEND");
  config.timestampSuffix = optionalBool("DRAINLOG_TIMESTAMP_SUFFIX");

  const capacity = env.DRAINLOG_QUEUE_CAPACITY;
  if (capacity) {
    const n = Number.parseInt(capacity, 10);
    if (Number.isNaN(n) || String(n) !== capacity.trim()) {
      errors.push({ field: "DRAINLOG_QUEUE_CAPACITY", message: `must be integer, got "${capacity}"` });
    } else {
      config.queueCapacity = n;
    }
  }

  const overflow = env.DRAINLOG_OVERFLOW;
  if (overflow) {
    if (overflow === "drop-oldest" || overflow === "drop-newest") {
      config.overflow = overflow;
    } else {
      errors.push({
        field: "DRAINLOG_OVERFLOW",
        message: `must be drop-oldest or drop-newest, got "${overflow}"`,
      });
    }
  }

  if (errors.length > 0) {
    const report = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
    throw new ConfigError(`Invalid environment configuration:\n${report}`);
  }
  return config;
}
