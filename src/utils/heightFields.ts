import type { HeightField } from "../domain/models/HeightModels";

const UNITO_MARKER = "┆Task is synchronized with this Gitlab issue by Unito";

export const DEFAULT_PRIORITY_FIELD_TEMPLATE_IDS = [
  "e5b1cb21-c337-4511-903b-861ed1cc9ae5",
  "b88e01b3-3028-47f1-8076-e6967fc31710",
];

/**
 * Strip sync markers left by Unito and trailing whitespace on each line.
 */
export function cleanDescription(description?: string | null): string {
  if (!description) return "";
  return description
    .split(UNITO_MARKER)
    .join("")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .trim();
}

export function extractPriority(
  fields: HeightField[] = [],
  priorityFieldTemplateIds: string[] = DEFAULT_PRIORITY_FIELD_TEMPLATE_IDS
): string {
  for (const field of fields) {
    const isPriority =
      field.name === "Priority" ||
      (field.fieldTemplateId !== undefined &&
        priorityFieldTemplateIds.includes(field.fieldTemplateId));
    if (!isPriority) continue;

    const option = field.label ?? field.selectValue;
    if (option) return option.value ?? "";
  }
  return "";
}
