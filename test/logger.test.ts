import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, expect, test } from "vitest";
import { loadConfig } from "../src/config";
import { createLoggers } from "../src/logger";

const dir = mkdtempSync(join(tmpdir(), "prompt-sieve-logs-"));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

test("writes app and audit logs to separate files", async () => {
  const config = loadConfig({ PROMPTSIEVE_LOG_DIR: dir, PROMPTSIEVE_PROFILE: "strict" });
  const loggers = createLoggers(config);

  loggers.app.info({ buckets: 8 }, "classifier ready");
  loggers.audit.warn({ action: "BLOCK" }, "prompt blocked");
  await loggers.close();

  const app = JSON.parse(readFileSync(join(dir, "app.log"), "utf8").trim());
  const audit = JSON.parse(readFileSync(join(dir, "audit.log"), "utf8").trim());

  expect(app.msg).toBe("classifier ready");
  expect(app.service).toBe("prompt-sieve");
  expect(app.profile).toBe("strict");
  expect(audit.msg).toBe("prompt blocked");
  expect(audit.service).toBe("prompt-sieve-audit");
  expect(audit.action).toBe("BLOCK");
});
