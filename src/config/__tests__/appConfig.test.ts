import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  getAppConfigPath,
  getDefaultFlowPath,
  loadAppConfig,
  resolveAppConfig,
  validateAppConfig,
} from "../appConfig.js";

const PROJECT_ROOT = path.resolve(__dirname, "../../..");

describe("appConfig", () => {
  const originalEnv = process.env;
  let tmpDir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.APP_CONFIG_PATH;
    delete process.env.FLOW_PATH;
    delete process.env.PORT;
    tmpDir = mkdtempSync(path.join(os.tmpdir(), "email-assistant-config-"));
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const configPath = path.join(tmpDir, "app.config.json");
    writeFileSync(configPath, JSON.stringify(content));
    process.env.APP_CONFIG_PATH = configPath;
    return configPath;
  }

  describe("getAppConfigPath", () => {
    it("defaults to app.config.json at the project root", () => {
      expect(getAppConfigPath()).toBe(path.join(PROJECT_ROOT, "app.config.json"));
    });

    it("resolves a relative APP_CONFIG_PATH from the project root", () => {
      process.env.APP_CONFIG_PATH = "config/custom.json";
      expect(getAppConfigPath()).toBe(path.join(PROJECT_ROOT, "config", "custom.json"));
    });
  });

  describe("loadAppConfig", () => {
    it("returns null when app config file does not exist", () => {
      process.env.APP_CONFIG_PATH = path.join(tmpDir, "missing.json");
      expect(loadAppConfig()).toBeNull();
    });

    it("loads and validates app config when file exists", () => {
      writeConfig({ flowPath: "graphs/email-assistant.flow.yaml", port: 8080 });
      expect(loadAppConfig()).toEqual({ flowPath: "graphs/email-assistant.flow.yaml", port: 8080 });
    });

    it("throws on an invalid port", () => {
      const configPath = writeConfig({ port: "eighty" });
      expect(() => loadAppConfig()).toThrow(`Invalid app config at ${configPath}`);
    });
  });

  describe("resolveAppConfig", () => {
    it("falls back to the bundled flow and port 3000", () => {
      process.env.APP_CONFIG_PATH = path.join(tmpDir, "missing.json");
      expect(resolveAppConfig()).toEqual({ configPath: null, flowPath: getDefaultFlowPath(), port: 3000 });
    });

    it("uses the flow and port from app config", () => {
      const flowPath = path.join(tmpDir, "custom.flow.yaml");
      writeFileSync(flowPath, "graph: {}\n");
      const configPath = writeConfig({ flowPath, port: 4100 });

      expect(resolveAppConfig()).toEqual({ configPath, flowPath, port: 4100 });
    });

    it("lets FLOW_PATH and PORT override app config", () => {
      writeConfig({ flowPath: "does/not/exist.yaml", port: 4100 });
      process.env.FLOW_PATH = "graphs/email-assistant.flow.yaml";
      process.env.PORT = "5055";

      const resolved = resolveAppConfig();
      expect(resolved.flowPath).toBe(getDefaultFlowPath());
      expect(resolved.port).toBe(5055);
    });

    it("rejects a PORT that is not a number", () => {
      process.env.APP_CONFIG_PATH = path.join(tmpDir, "missing.json");
      process.env.PORT = "http";
      expect(() => resolveAppConfig()).toThrow('Invalid PORT "http"');
    });
  });

  describe("validateAppConfig", () => {
    it("throws when the flow file is missing", () => {
      const flowPath = path.join(tmpDir, "nope.yaml");
      expect(() => validateAppConfig({ configPath: null, flowPath, port: 3000 })).toThrow(`Flow not found: ${flowPath}.`);
    });
  });
});
