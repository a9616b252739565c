#!/usr/bin/env node
import { createInterface } from "node:readline";
import { createDiagnosticsLogger } from "../adapters/structured-logger.js";
import { loadSinkConfigFromEnv } from "../config/env.js";
import { createLogSink } from "../core/create-log-sink.js";
import { PRESET_TEMPLATES, type PresetTemplateName } from "../core/formatter.js";
import { errorMessage } from "../errors.js";
import type { SinkConfig } from "../types/config.js";
import { LogLevel, parseLogLevel } from "../types/log-level.js";
import { OutputTarget, parseOutputTarget } from "../types/output-target.js";
import { registerShutdownSignals } from "../utils/signal-handler.js";

// ── Arg parsing ────────────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
  drainlog — pipe lines through an asynchronous log sink

  Usage: some-command | drainlog [options]

  Options:
    --level <name>          Level for every input line (default: info)
    --min-level <name>      Minimum level written (default: trace)
    --target <where>        console, file or both (default: console)
    --file <path>           Log file; implies --target both unless --target is given
    --template <tpl>        Line template, e.g. "{t} | {L} | {f}:{l} -> {m}"
    --preset <name>         Named template: default, level, time, source
    --truncate              Overwrite the log file instead of appending
    --no-suffix             Do not insert the startup timestamp into the file name
    --verbose, -v           Report the sink's own diagnostics at debug level
    --help, -h              Show this help

  Environment: DRAINLOG_LEVEL, DRAINLOG_TARGET, DRAINLOG_TEMPLATE, DRAINLOG_FILE,
  DRAINLOG_APPEND, DRAINLOG_TIMESTAMP_SUFFIX, DRAINLOG_QUEUE_CAPACITY, DRAINLOG_OVERFLOW.
  Flags take precedence.
`);
}

interface CliOptions {
  lineLevel: LogLevel;
  verbose: boolean;
  config: SinkConfig;
}

function fail(message: string): never {
  console.error(`Error: ${message}\nRun with --help for usage.`);
  process.exit(1);
}

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i];
  if (value === undefined) fail(`${flag} requires a value`);
  return value;
}

function isPreset(name: string): name is PresetTemplateName {
  return Object.hasOwn(PRESET_TEMPLATES, name);
}

function parseArgs(argv: string[], base: SinkConfig): CliOptions {
  const config: SinkConfig = { ...base };
  let lineLevel = LogLevel.Info;
  let verbose = false;
  let targetGiven = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--level": {
        const name = requireValue(argv, ++i, arg);
        lineLevel = parseLogLevel(name) ?? fail(`unknown level "${name}"`);
        break;
      }
      case "--min-level": {
        const name = requireValue(argv, ++i, arg);
        config.level = parseLogLevel(name) ?? fail(`unknown level "${name}"`);
        break;
      }
      case "--target": {
        const name = requireValue(argv, ++i, arg);
        config.target = parseOutputTarget(name) ?? fail(`unknown target "${name}"`);
        targetGiven = true;
        break;
      }
      case "--file":
        config.filePath = requireValue(argv, ++i, arg);
        break;
      case "--template":
        config.template = requireValue(argv, ++i, arg);
        break;
      case "--preset": {
        const name = requireValue(argv, ++i, arg);
        if (!isPreset(name)) fail(`unknown preset "${name}"`);
        config.template = PRESET_TEMPLATES[name];
        break;
      }
      case "--truncate":
        config.append = false;
        break;
      case "--no-suffix":
        config.timestampSuffix = false;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        printHelp();
        process.exit(0);
        break;
      default:
        fail(`unknown option: ${arg}`);
    }
  }

  if (config.filePath && !targetGiven && base.target === undefined) {
    config.target = OutputTarget.Both;
  }
  return { lineLevel, verbose, config };
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseArgs(process.argv, loadSinkConfigFromEnv());
  const logger = createDiagnosticsLogger(options.verbose ? LogLevel.Debug : LogLevel.Warning);
  const sink = createLogSink(options.config, { logger });
  registerShutdownSignals(sink, { logger });

  const input = createInterface({ input: process.stdin, crlfDelay: Number.POSITIVE_INFINITY });
  let lineNumber = 0;
  for await (const line of input) {
    lineNumber++;
    sink.log(options.lineLevel, line, "<stdin>", lineNumber);
  }

  await sink.shutdown();
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
