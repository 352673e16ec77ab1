import { z } from "zod";

export function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

export function parseList(value: string | string[] | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  const entries = Array.isArray(value) ? value : value.split(",");
  const cleaned = entries.map((entry) => entry.trim().toLowerCase()).filter((entry) => entry.length > 0);
  return cleaned.length > 0 ? cleaned : undefined;
}

export function toFriendlyZodError(error: z.ZodError): string {
  const details = error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `- ${path}: ${issue.message}`;
    })
    .join("\n");
  return `Malformed jit-access config:\n${details}`;
}
