import dotenv from "dotenv";
dotenv.config();

import type {
  LinearConfig,
  MigrationConfig,
} from "./domain/models/ConfigModels";
import type { StatusMap } from "./domain/models/MappingModels";
import { DEFAULT_STATUS_MAP } from "./domain/services/TaskTransformer";
import { DEFAULT_PRIORITY_FIELD_TEMPLATE_IDS } from "./utils/heightFields";

export const DEFAULT_LINEAR_API_URL = "https://api.linear.app/graphql";

type Env = Record<string, string | undefined>;

/** Flags shared by both CLIs; anything unset falls back to the environment. */
export interface CliArgs {
  inputDir?: string;
  output?: string;
  useHeightIds?: boolean;
  generateBoth?: boolean;
  mapping?: string;
  team?: string;
  pageSize?: number;
  dryRun?: boolean;
  yes?: boolean;
}

function parseJsonEnv<T>(
  env: Env,
  key: string,
  defaultValue: T,
  guard: (value: unknown) => value is T
): T {
  const v = env[key];
  if (!v) return defaultValue;
  let parsed: unknown;
  try {
    parsed = JSON.parse(v);
  } catch {
    throw new Error(`Invalid JSON in env var ${key}`);
  }
  if (!guard(parsed)) throw new Error(`Unexpected JSON shape in env var ${key}`);
  return parsed;
}

function parseIntEnv(env: Env, key: string, defaultValue: number): number {
  const v = env[key];
  if (!v) return defaultValue;
  const n = Number.parseInt(v, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Env var ${key} must be a positive integer, got "${v}"`);
  }
  return n;
}

const isStatusMap = (value: unknown): value is StatusMap =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((v) => typeof v === "string");

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

export function loadConfig(
  args: CliArgs = {},
  env: Env = process.env
): MigrationConfig {
  return {
    export: {
      inputDir: args.inputDir ?? env.HEIGHT_EXPORT_DIR ?? "height-export",
      outputPath: args.output ?? env.LINEAR_IMPORT_CSV ?? "linear_import.csv",
      useHeightIds: args.useHeightIds ?? false,
      generateBoth: args.generateBoth ?? false,
      statusMap: {
        ...DEFAULT_STATUS_MAP,
        ...parseJsonEnv<StatusMap>(env, "HEIGHT_LINEAR_STATUS_MAP", {}, isStatusMap),
      },
      priorityFieldTemplateIds: parseJsonEnv(
        env,
        "HEIGHT_PRIORITY_FIELD_IDS",
        DEFAULT_PRIORITY_FIELD_TEMPLATE_IDS,
        isStringArray
      ),
    },
    linear: {
      apiUrl: env.LINEAR_API_URL ?? DEFAULT_LINEAR_API_URL,
      apiKey: env.LINEAR_API_KEY?.trim() || undefined,
      teamKey: args.team ?? (env.LINEAR_TEAM_KEY || undefined),
      pageSize: args.pageSize ?? parseIntEnv(env, "LINEAR_PAGE_SIZE", 100),
    },
    relationships: {
      mappingPath:
        args.mapping ?? env.PARENT_MAPPING_FILE ?? "parent_mapping.json",
      dryRun: args.dryRun ?? false,
      assumeYes: args.yes ?? false,
    },
  };
}

/** Fails before any network call when the API key is absent. */
export function requireLinearConfig(config: MigrationConfig): LinearConfig {
  const { apiKey, ...rest } = config.linear;
  if (!apiKey) throw new Error("Missing required env variable LINEAR_API_KEY");
  return { ...rest, apiKey };
}
