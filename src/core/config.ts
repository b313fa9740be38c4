/**
 * Runtime Configuration
 *
 * Reads tunables from the environment (and a local .env file, if present).
 * Values are validated once at load time; out-of-range numbers fall back to
 * their defaults or are clamped into range.
 */
import dotenv from "dotenv";

dotenv.config();

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface PaintConfig {
  /** Undo depth per document */
  historyLimit: number;
  logLevel: LogLevel;
  /** Default animation playback rate (frames per second) */
  frameRate: number;
  /** Default document resolution (DPI) */
  resolution: number;
}

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

function readInt(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

function readLogLevel(): LogLevel {
  const raw = process.env.PAINT_LOG_LEVEL?.toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (level) return level;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

export function loadConfig(): PaintConfig {
  return {
    historyLimit: readInt("PAINT_HISTORY_LIMIT", 50, 1, 500),
    logLevel: readLogLevel(),
    frameRate: readInt("PAINT_FRAME_RATE", 24, 1, 120),
    resolution: readInt("PAINT_DEFAULT_RESOLUTION", 300, 1, 2400),
  };
}

export const config: PaintConfig = loadConfig();
