import { readFile } from "node:fs/promises";
import type { ParentMapping } from "../../domain/models/MappingModels";

function isParentMapping(value: unknown): value is ParentMapping {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

/** Load the child → parent map written by the exporter. */
export async function loadParentMapping(file: string): Promise<ParentMapping> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (err) {
    const code =
      err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      throw new Error(
        `${file} not found. Run the Height exporter first to generate it.`
      );
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new Error(`Invalid JSON in parent mapping ${file}`);
  }
  if (!isParentMapping(data)) {
    throw new Error(
      `Parent mapping ${file} must be an object of child ID → parent ID strings`
    );
  }
  return data;
}
