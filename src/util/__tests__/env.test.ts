import { loadConfig } from "../../util/config";
import {
  getBoolean,
  getEnvVar,
  getNumber,
  getStage,
  getString,
  isProduction,
  isTest,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with APP_STAGE", () => {
    process.env.APP_STAGE = "prod";
    expect(getStage()).toBe("prod");
    expect(isProduction()).toBe(true);
  });

  test("stage fallback to NODE_ENV", () => {
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
    process.env.NODE_ENV = "development";
    expect(getStage()).toBe("dev");
  });

  test("isTest holds under jest", () => {
    expect(isTest()).toBe(true);
  });

  test("getEnvVar returns default when missing", () => {
    expect(getEnvVar("UNKNOWN_VAR", { defaultValue: "abc" })).toBe("abc");
    expect(getEnvVar("UNKNOWN_VAR")).toBeUndefined();
  });

  test("getEnvVar throws for a missing required var", () => {
    expect(() => getEnvVar("UNKNOWN_VAR", { required: true, stageAware: false })).toThrow(
      "Missing required env var: UNKNOWN_VAR"
    );
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.APP_STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getEnvVar("MY_KEY")).toBe("staged");
    expect(getEnvVar("MY_KEY", { stageAware: false })).toBe("plain");
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "yes";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    expect(getBoolean("BOOL_KEY")).toBe(true);
    process.env.NUMBER_KEY = "many";
    expect(() => getNumber("NUMBER_KEY")).toThrow("Env var NUMBER_KEY is not a number: many");
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
  });
});

describe("loadConfig", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.ARCHIVE_DIR;
    delete process.env.PRIMARY_SHEET;
    delete process.env.WINDOW_WEEKS;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("defaults", () => {
    expect(loadConfig()).toEqual({
      archiveDir: "data",
      primarySheet: "Weekly_Report",
      windowWeeks: 13,
    });
  });

  test("reads overrides from the environment", () => {
    process.env.ARCHIVE_DIR = "/tmp/cot";
    process.env.WINDOW_WEEKS = "26";
    expect(loadConfig()).toMatchObject({ archiveDir: "/tmp/cot", windowWeeks: 26 });
  });

  test("rejects a non-positive window", () => {
    process.env.WINDOW_WEEKS = "0";
    expect(() => loadConfig()).toThrow();
  });

  test("explicit overrides win", () => {
    expect(loadConfig({ primarySheet: "Current" }).primarySheet).toBe("Current");
  });
});
