import { ownValue } from "./records.js";

export function interpolate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => ownValue(vars, key) ?? match);
}

/** String form of a context value for templates; structured values become JSON. */
export function templateValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value) && value.every((item) => typeof item === "string")) return value.join(", ");
  return JSON.stringify(value);
}

export function buildTemplateVars(values: Record<string, unknown>, extra: Record<string, string> = {}): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    const text = templateValue(value);
    if (text !== null) vars[key] = text;
  }
  return { ...vars, ...extra };
}
