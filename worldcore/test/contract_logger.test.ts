// worldcore/test/contract_logger.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { logEnabled } from "../config/logconfig";
import { Logger, setLogSink } from "../utils/logger";
import { withEnv } from "./testUtils";

function capture(fn: () => void): unknown[][] {
  const calls: unknown[][] = [];
  setLogSink((line, ...meta) => calls.push([line, ...meta]));
  try {
    fn();
  } finally {
    setLogSink(null);
  }
  return calls;
}

test("[contract] logconfig: per-scope defaults, LOG_LEVEL, then LOG_SCOPE_* overrides", () => {
  withEnv({ LOG_LEVEL: undefined, LOG_SCOPE_WAVE: undefined, LOG_SCOPE_EVENT: undefined }, () => {
    assert.equal(logEnabled("WAVE", "info"), true);
    assert.equal(logEnabled("WAVE", "debug"), false);
    assert.equal(logEnabled("EVENT", "info"), false);
    assert.equal(logEnabled("SOMETHING_ELSE", "info"), true);
  });

  withEnv({ LOG_LEVEL: "error", LOG_SCOPE_WAVE: "debug" }, () => {
    assert.equal(logEnabled("WAVE", "debug"), true);
    assert.equal(logEnabled("ELECTION", "warn"), false);
  });
});

test("[contract] Logger: scoped tag, plain text under NO_COLOR, errors expanded", () => {
  withEnv({ NO_COLOR: "1", LOG_LEVEL: undefined, LOG_SCOPE_WAVE: undefined }, () => {
    const err = new Error("kaboom");
    const calls = capture(() => {
      const log = Logger.scope("wave");
      log.debug("hidden");
      log.warn("Despawn failed", err);
    });

    assert.equal(calls.length, 1);
    const [line, meta] = calls[0] ?? [];
    assert.equal(typeof line, "string");
    assert.match(String(line), /^\d{2}:\d{2}:\d{2}\.\d{3} \[WAVE:WARN\] Despawn failed$/);
    assert.deepEqual(meta, { error: "kaboom", name: "Error", stack: err.stack });
  });
});
