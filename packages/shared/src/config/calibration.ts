import * as fs from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import { CalibrationOffset } from "../types/action.types";

const CONFIG_FILE_NAME = "calibration.json";
const CONFIG_RELATIVE_PATH = join("config", CONFIG_FILE_NAME);
export const CALIBRATION_CONFIG_ENV = "DESKPILOT_CALIBRATION_CONFIG";

const calibrationFileSchema = z.object({
  clickOffsetX: z.number().int(),
  clickOffsetY: z.number().int(),
});

export type CalibrationFile = z.infer<typeof calibrationFileSchema>;

export type CalibrationLoadResult = {
  offset: CalibrationOffset;
  /** Null when no file was found and the zero offset applies. */
  path: string | null;
};

type SearchResult = string | null;

const searchUpwards = (start: string): SearchResult => {
  let current = resolve(start);
  const visited = new Set<string>();

  while (!visited.has(current)) {
    visited.add(current);

    const candidate = join(current, CONFIG_RELATIVE_PATH);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      break;
    }

    current = parent;
  }

  return null;
};

const resolveOverridePath = (candidate: string): string => {
  const resolvedPath = isAbsolute(candidate)
    ? candidate
    : resolve(process.cwd(), candidate);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(
      `${CALIBRATION_CONFIG_ENV} points to "${candidate}" but the file was not found.`,
    );
  }

  return resolvedPath;
};

/**
 * Locates config/calibration.json by walking up from the working directory
 * and from this module. An explicit override must exist.
 */
export const resolveCalibrationPath = (): string | null => {
  const override = process.env[CALIBRATION_CONFIG_ENV];
  if (override && override.trim().length > 0) {
    return resolveOverridePath(override.trim());
  }

  const searchOrigins = [process.cwd(), __dirname];
  const checked = new Set<string>();

  for (const origin of searchOrigins) {
    const resolvedOrigin = resolve(origin);
    if (checked.has(resolvedOrigin)) {
      continue;
    }

    checked.add(resolvedOrigin);
    const discovered = searchUpwards(resolvedOrigin);
    if (discovered) {
      return discovered;
    }
  }

  return null;
};

export const parseCalibrationFile = (
  raw: string,
  source: string,
): CalibrationOffset => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Calibration file ${source} is not valid JSON: ${reason}`);
  }

  const parsed = calibrationFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Calibration file ${source} is invalid: ${issues}`);
  }

  return { dx: parsed.data.clickOffsetX, dy: parsed.data.clickOffsetY };
};

/**
 * Reads the persisted click offset. A missing file means no correction.
 */
export const readCalibrationOffset = (): CalibrationLoadResult => {
  const configPath = resolveCalibrationPath();
  if (!configPath) {
    return { offset: { dx: 0, dy: 0 }, path: null };
  }
  const raw = fs.readFileSync(configPath, "utf8");
  return { offset: parseCalibrationFile(raw, configPath), path: configPath };
};

/**
 * Persists a click offset, creating the config directory when needed.
 * Defaults to the discovered file, else config/calibration.json under cwd.
 */
export const writeCalibrationOffset = (
  offset: CalibrationOffset,
  targetPath?: string,
): string => {
  const configPath =
    targetPath ??
    resolveCalibrationPath() ??
    resolve(process.cwd(), CONFIG_RELATIVE_PATH);

  const contents: CalibrationFile = {
    clickOffsetX: Math.round(offset.dx),
    clickOffsetY: Math.round(offset.dy),
  };

  fs.mkdirSync(dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, `${JSON.stringify(contents, null, 2)}\n`, "utf8");
  return configPath;
};
