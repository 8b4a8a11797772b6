import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";

export const SETTINGS_FILE = ".colcon-workbench.json";

export const BUILD_TYPES = ["auto", "Release", "Debug"] as const;
export const THEMES = ["light", "dark"] as const;

export type BuildType = (typeof BUILD_TYPES)[number];
export type Theme = (typeof THEMES)[number];

export function defaultParallelWorkers(): number {
  return os.cpus().length || 8;
}

export const SettingsSchema = z.object({
  selectedPackages: z.array(z.string()).default([]),
  symlinkInstall: z.boolean().default(true),
  parallelWorkers: z.number().int().min(1).default(defaultParallelWorkers),
  buildType: z.enum(BUILD_TYPES).default("auto"),
  theme: z.enum(THEMES).default("dark"),
});

export type Settings = z.infer<typeof SettingsSchema>;

export class SettingsError extends Error {
  constructor(
    readonly settingsPath: string,
    message: string,
  ) {
    super(`${settingsPath}: ${message}`);
    this.name = "SettingsError";
  }
}

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

export function settingsPathFor(root: string): string {
  return path.join(root, SETTINGS_FILE);
}

/**
 * Read the settings file. A missing file yields the defaults;
 * unreadable JSON or a schema violation throws SettingsError.
 */
export function loadSettings(settingsPath: string): Settings {
  if (!fs.existsSync(settingsPath)) return defaultSettings();

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
  } catch (err) {
    throw new SettingsError(settingsPath, err instanceof Error ? err.message : String(err));
  }

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new SettingsError(settingsPath, issues.join("; "));
  }
  return result.data;
}

export function saveSettings(settingsPath: string, settings: Settings): void {
  fs.mkdirSync(path.dirname(settingsPath), { recursive: true });
  fs.writeFileSync(settingsPath, JSON.stringify(settings, null, 2) + "\n");
}
