import { describe, it, expect } from "vitest";
import {
  DEFAULT_LINEAR_API_URL,
  loadConfig,
  requireLinearConfig,
} from "../src/config";
import { DEFAULT_STATUS_MAP } from "../src/domain/services/TaskTransformer";
import { DEFAULT_PRIORITY_FIELD_TEMPLATE_IDS } from "../src/utils/heightFields";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({}, {})).toEqual({
      export: {
        inputDir: "height-export",
        outputPath: "linear_import.csv",
        useHeightIds: false,
        generateBoth: false,
        statusMap: DEFAULT_STATUS_MAP,
        priorityFieldTemplateIds: DEFAULT_PRIORITY_FIELD_TEMPLATE_IDS,
      },
      linear: {
        apiUrl: DEFAULT_LINEAR_API_URL,
        apiKey: undefined,
        teamKey: undefined,
        pageSize: 100,
      },
      relationships: {
        mappingPath: "parent_mapping.json",
        dryRun: false,
        assumeYes: false,
      },
    });
  });

  it("reads the environment", () => {
    const config = loadConfig(
      {},
      {
        HEIGHT_EXPORT_DIR: "exports/height",
        LINEAR_IMPORT_CSV: "out/import.csv",
        LINEAR_API_KEY: " test-key ",
        LINEAR_TEAM_KEY: "ENG",
        LINEAR_PAGE_SIZE: "25",
        PARENT_MAPPING_FILE: "out/parent_mapping.json",
        HEIGHT_LINEAR_STATUS_MAP: '{"status-uuid":"Todo","done":"Completed"}',
        HEIGHT_PRIORITY_FIELD_IDS: '["prio-field"]',
      }
    );

    expect(config.export.inputDir).toBe("exports/height");
    expect(config.export.outputPath).toBe("out/import.csv");
    expect(config.export.statusMap).toEqual({
      ...DEFAULT_STATUS_MAP,
      "status-uuid": "Todo",
      done: "Completed",
    });
    expect(config.export.priorityFieldTemplateIds).toEqual(["prio-field"]);
    expect(config.linear).toEqual({
      apiUrl: DEFAULT_LINEAR_API_URL,
      apiKey: "test-key",
      teamKey: "ENG",
      pageSize: 25,
    });
    expect(config.relationships.mappingPath).toBe("out/parent_mapping.json");
  });

  it("lets flags win over the environment", () => {
    const config = loadConfig(
      { inputDir: "cli-dir", team: "OPS", pageSize: 10, yes: true, generateBoth: true },
      { HEIGHT_EXPORT_DIR: "env-dir", LINEAR_TEAM_KEY: "ENG", LINEAR_PAGE_SIZE: "25" }
    );

    expect(config.export.inputDir).toBe("cli-dir");
    expect(config.export.generateBoth).toBe(true);
    expect(config.linear.teamKey).toBe("OPS");
    expect(config.linear.pageSize).toBe(10);
    expect(config.relationships.assumeYes).toBe(true);
  });

  it("rejects malformed JSON variables", () => {
    expect(() => loadConfig({}, { HEIGHT_LINEAR_STATUS_MAP: "{nope" })).toThrow(
      "Invalid JSON in env var HEIGHT_LINEAR_STATUS_MAP"
    );
    expect(() => loadConfig({}, { HEIGHT_PRIORITY_FIELD_IDS: '{"a":1}' })).toThrow(
      "Unexpected JSON shape in env var HEIGHT_PRIORITY_FIELD_IDS"
    );
  });

  it("rejects a non-numeric page size", () => {
    expect(() => loadConfig({}, { LINEAR_PAGE_SIZE: "lots" })).toThrow(
      'Env var LINEAR_PAGE_SIZE must be a positive integer, got "lots"'
    );
  });
});

describe("requireLinearConfig", () => {
  it("returns the Linear settings when the key is present", () => {
    const config = loadConfig({ team: "ENG" }, { LINEAR_API_KEY: "test-key" });

    expect(requireLinearConfig(config)).toEqual({
      apiUrl: DEFAULT_LINEAR_API_URL,
      apiKey: "test-key",
      teamKey: "ENG",
      pageSize: 100,
    });
  });

  it("fails fast without a credential", () => {
    expect(() => requireLinearConfig(loadConfig({}, { LINEAR_API_KEY: "  " }))).toThrow(
      "Missing required env variable LINEAR_API_KEY"
    );
  });
});
