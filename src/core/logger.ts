/**
 * JSONL event log.
 * Purpose: append one JSON object per registry event to a log file.
 * Assumptions: a single process writes the file; events are small.
 * Usage: logRegistryEvent(logger, "brand.update", { brand: "acme", version: "1.1.0" }).
 */

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  brand?: string;
  payload?: JsonObject;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  constructor(
    public readonly filePath: string,
    private readonly defaults: JsonObject = {},
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const record: JsonObject = {
      ts: isoNow(),
      ...this.defaults,
      type: event.type,
      ...(event.brand ? { brand: event.brand } : {}),
      ...(event.payload ? { payload: event.payload } : {}),
    };
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export function logRegistryEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload: JsonObject & { brand?: string } = {},
): void {
  if (!logger) return;

  const { brand, ...rest } = payload;
  logger.log({
    type,
    ...(typeof brand === "string" ? { brand } : {}),
    ...(Object.keys(rest).length > 0 ? { payload: rest } : {}),
  });
}

export function readJsonlEvents(filePath: string): JsonObject[] {
  if (!fs.existsSync(filePath)) return [];

  const events: JsonObject[] = [];
  for (const line of fs.readFileSync(filePath, "utf8").split("\n")) {
    if (line.trim().length === 0) continue;
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      events.push(toJsonObject(parsed));
    }
  }
  return events;
}

function toJsonObject(value: object): JsonObject {
  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = toJsonValue(entry);
  }
  return result;
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "number") return value;
  if (typeof value === "boolean") return value;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") return toJsonObject(value);
  return null;
}
