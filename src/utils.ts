/**
 * HoopsRouter-MCP: Core Utilities
 *
 * Deterministic helpers for text normalization, hashing, ID generation,
 * error shaping and structured logging.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { createHash } from "crypto";
import { v7 as uuidv7 } from "uuid";
import type { EventLogEntry, ErrorCode, LogLevel, ToolError } from "./types.js";

// ============================================================================
// Hashing Utilities (Deterministic)
// ============================================================================

/**
 * Generate SHA256 hash of content
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Short, stable fingerprint of a query for log lines (raw text never logged)
 */
export function hashQuery(query: string): string {
  return sha256(query).slice(0, 12);
}

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generate time-ordered UUID v7 for classification requests
 */
export function generateRequestId(): string {
  return uuidv7();
}

// ============================================================================
// Text Utilities
// ============================================================================

/**
 * Normalize a user question for pattern matching.
 *
 * Lower-cases, turns em dash, en dash and space-surrounded hyphens into a
 * single " - " token and collapses whitespace. In-word hyphens
 * ("triple-double") and token order are preserved.
 *
 * @example
 * normalizeQuery("  Top scorers—why?  ")  // "top scorers - why?"
 * normalizeQuery("Pick-and-roll   usage") // "pick-and-roll usage"
 */
export function normalizeQuery(query: string): string {
  return query
    .trim()
    .toLowerCase()
    .replace(/\s*[—–]\s*/g, " - ")
    .replace(/\s+-\s+/g, " - ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Split text into whitespace-separated words (empty text has none)
 */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(w => w.length > 0);
}

/**
 * Count non-overlapping occurrences of a literal substring
 */
export function countOccurrences(text: string, needle: string): number {
  if (needle.length === 0) return 0;
  return text.split(needle).length - 1;
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

/**
 * Narrow an unknown thrown value to a ToolError
 */
export function isToolError(value: unknown): value is ToolError {
  return (
    typeof value === "object" &&
    value !== null &&
    "isError" in value &&
    value.isError === true &&
    "code" in value &&
    typeof value.code === "string" &&
    "message" in value &&
    typeof value.message === "string"
  );
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

// ============================================================================
// Logging
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create an event log entry
 */
export function createLogEntry(
  level: EventLogEntry["level"],
  phase: string,
  tool: string,
  message: string,
  data?: unknown
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    phase,
    tool,
    message,
    data,
  };
}

export type LogSink = (line: string) => void;

/**
 * Writes one JSON object per line to stderr (stdout belongs to the MCP transport).
 *
 * Logging is fire-and-forget: a sink that throws, or data that cannot be
 * serialized, is counted in `droppedEntries` and never reaches the caller.
 */
export class EventLogger {
  private level: LogLevel;
  private sink: LogSink;
  private dropped = 0;

  constructor(level: LogLevel = "info", sink: LogSink = line => console.error(line)) {
    this.level = level;
    this.sink = sink;
  }

  get droppedEntries(): number {
    return this.dropped;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  log(entry: EventLogEntry): void {
    if (!this.isEnabled(entry.level)) return;
    try {
      this.sink(JSON.stringify(entry));
    } catch {
      this.dropped++;
    }
  }

  debug(phase: string, tool: string, message: string, data?: unknown): void {
    this.log(createLogEntry("debug", phase, tool, message, data));
  }

  info(phase: string, tool: string, message: string, data?: unknown): void {
    this.log(createLogEntry("info", phase, tool, message, data));
  }

  warn(phase: string, tool: string, message: string, data?: unknown): void {
    this.log(createLogEntry("warn", phase, tool, message, data));
  }

  error(phase: string, tool: string, message: string, data?: unknown): void {
    this.log(createLogEntry("error", phase, tool, message, data));
  }
}
