/**
 * Configuration tests.
 *
 * Run: node --import tsx src/config/config.test.ts
 */

import { strict as assert } from "node:assert";
import { readFileSync } from "node:fs";

import {
  APP_ENV_VARIABLES,
  ConfigError,
  ConfigValidationError,
  DEFAULT_VIEW_CONFIG,
  ViewConfigError,
  configuredLogLevel,
  envVariableFor,
  loadAppConfig,
  loadViewConfig,
  readConfigEnvironment,
  validateConfig,
  VIEW_ENV_VARIABLES,
  type AppConfig,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function makeAppConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: "test",
    debug: false,
    logLevel: "info",
    view: DEFAULT_VIEW_CONFIG,
    ...overrides,
  };
}

/** Run `fn`, expecting it to throw a ConfigValidationError. */
function validationErrorOf(fn: () => unknown): ConfigValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigValidationError) return err;
    throw err;
  }
  assert.fail("expected ConfigValidationError");
}

// ═══════════════════════════════════════════════════════════════════════════
// VIEW CONFIG
// ═══════════════════════════════════════════════════════════════════════════

section("View Config");

test("defaults validate and load frozen", () => {
  const config = loadViewConfig(DEFAULT_VIEW_CONFIG);

  assert.deepEqual(config, DEFAULT_VIEW_CONFIG);
  assert.equal(Object.isFrozen(config), true);
});

test("omitted fields take their defaults", () => {
  const config = loadViewConfig({ errorOutput: "comment" });

  assert.deepEqual(config, { ...DEFAULT_VIEW_CONFIG, errorOutput: "comment" });
});

test("invalid values raise ViewConfigError with structured issues", () => {
  const err = validationErrorOf(() =>
    loadViewConfig({ ...DEFAULT_VIEW_CONFIG, layoutChildName: "", errorOutput: "loud" })
  );

  assert.ok(err instanceof ViewConfigError);
  assert.ok(err instanceof ConfigError);
  assert.equal(err.message, "Invalid view configuration: 2 validation error(s)");
  assert.deepEqual(
    err.issues.map((i) => i.path.join(".")),
    ["layoutChildName", "errorOutput"]
  );
  assert.ok(err.format().startsWith("View configuration validation failed:\n  - layoutChildName: "));
});

test("unknown keys are rejected", () => {
  const err = validationErrorOf(() => loadViewConfig({ ...DEFAULT_VIEW_CONFIG, theme: "dark" }));

  assert.equal(err.issues[0].code, "unrecognized_keys");
});

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Environment");

test("only set, non-empty variables reach the raw config", () => {
  const raw = readConfigEnvironment({ LOG_LEVEL: "warn", DEBUG: "", VIEW_LAYOUT_CHILD: "wrapper" });

  assert.deepEqual(raw, { logLevel: "warn", view: { layoutChildName: "wrapper" } });
});

test(".env.example lists every variable the configuration reads", () => {
  const example = readFileSync(new URL("../../.env.example", import.meta.url), "utf8");
  const listed = example
    .split("\n")
    .filter((line) => line.includes("="))
    .map((line) => line.slice(0, line.indexOf("=")));

  assert.deepEqual(listed, [
    ...Object.values(APP_ENV_VARIABLES),
    ...Object.values(VIEW_ENV_VARIABLES),
  ]);
});

test("config paths map back to their variables", () => {
  assert.equal(envVariableFor(["logLevel"]), "LOG_LEVEL");
  assert.equal(envVariableFor(["view", "layoutNameArgument"]), "VIEW_LAYOUT_ARGUMENT");
  assert.equal(envVariableFor(["view"]), undefined);
  assert.equal(envVariableFor(["toString"]), undefined);
});

test("without variables every setting falls back to its default", () => {
  const config = loadAppConfig({});

  assert.equal(config.env, "development");
  assert.equal(config.debug, false);
  assert.equal(config.logLevel, "info");
  assert.deepEqual(config.view, DEFAULT_VIEW_CONFIG);
});

test("VIEW_* variables configure the view", () => {
  const { view } = loadAppConfig({
    VIEW_DEFAULT_CONTROLLER: "Blog",
    VIEW_DEFAULT_ACTION: "Index",
    VIEW_LAYOUT_CHILD: "wrapper",
    VIEW_LAYOUT_ARGUMENT: "layout",
    VIEW_ERROR_OUTPUT: "silent",
  });

  assert.deepEqual(view, {
    defaultControllerName: "Blog",
    defaultActionName: "Index",
    layoutChildName: "wrapper",
    layoutNameArgument: "layout",
    errorOutput: "silent",
  });
});

test("DEBUG accepts boolean words in any case", () => {
  assert.equal(loadAppConfig({ DEBUG: "YES" }).debug, true);
  assert.equal(loadAppConfig({ DEBUG: "1" }).debug, true);
  assert.equal(loadAppConfig({ DEBUG: "False" }).debug, false);
  assert.equal(loadAppConfig({ DEBUG: "0" }).debug, false);
});

test("the loaded configuration is frozen all the way down", () => {
  const config = loadAppConfig({ NODE_ENV: "production" });

  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.view), true);
});

test("an invalid VIEW_ERROR_OUTPUT fails fast and names the variable", () => {
  const err = validationErrorOf(() => loadAppConfig({ VIEW_ERROR_OUTPUT: "loud" }));

  assert.equal(err.message, "Invalid application configuration: 1 validation error(s)");
  assert.deepEqual(err.issues[0].path, ["view", "errorOutput"]);
  assert.equal(err.issues[0].variable, "VIEW_ERROR_OUTPUT");
  const lines = err.format().split("\n");
  assert.equal(lines[0], "Application configuration validation failed:");
  assert.ok(lines[1].startsWith("  - view.errorOutput (VIEW_ERROR_OUTPUT): "));
});

test("a malformed DEBUG value is a ConfigError", () => {
  const err = validationErrorOf(() => loadAppConfig({ DEBUG: "maybe" }));

  assert.ok(err instanceof ConfigError);
  assert.deepEqual(err.issues.map((i) => i.variable), ["DEBUG"]);
});

test("unknown NODE_ENV and LOG_LEVEL are both reported", () => {
  const err = validationErrorOf(() => loadAppConfig({ NODE_ENV: "staging", LOG_LEVEL: "trace" }));

  assert.deepEqual(err.issues.map((i) => i.variable), ["NODE_ENV", "LOG_LEVEL"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("Validation");

test("a parsed configuration validates unchanged", () => {
  assert.deepEqual(validateConfig(makeAppConfig()), makeAppConfig());
});

test("unknown NODE_ENV is rejected", () => {
  const err = validationErrorOf(() => validateConfig({ ...makeAppConfig(), env: "staging" }));

  assert.deepEqual(err.issues[0].path, ["env"]);
});

test("unknown LOG_LEVEL is rejected", () => {
  assert.throws(() => validateConfig({ ...makeAppConfig(), logLevel: "trace" }), ConfigError);
});

test("configuredLogLevel returns the validated level", () => {
  assert.equal(configuredLogLevel(makeAppConfig({ logLevel: "warn" })), "warn");
});

test("DEBUG forces the debug level", () => {
  assert.equal(configuredLogLevel(makeAppConfig({ debug: true, logLevel: "error" })), "debug");
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
