import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const IgnoreDefaultsSchema = z.object({
  directories: z.array(z.string().min(1)),
  extensions: z.array(z.string().startsWith('.'))
});

export type IgnoreDefaults = z.infer<typeof IgnoreDefaultsSchema>;

// data/ sits two levels above both src/utils and dist/utils
const DEFAULTS_PATH = fileURLToPath(new URL('../../data/ignore-defaults.json', import.meta.url));

let cachedDefaults: IgnoreDefaults | null = null;

/**
 * Directory names and file extensions that are never indexed or watched
 */
export function getIgnoreDefaults(): IgnoreDefaults {
  if (!cachedDefaults) {
    const raw: unknown = JSON.parse(fs.readFileSync(DEFAULTS_PATH, 'utf8'));
    cachedDefaults = IgnoreDefaultsSchema.parse(raw);
  }
  return cachedDefaults;
}

export function getIgnoredDirectoryNames(): ReadonlySet<string> {
  return new Set(getIgnoreDefaults().directories);
}

/**
 * fast-glob ignore globs for the default directory names
 */
export function getDefaultScanIgnores(): string[] {
  return getIgnoreDefaults().directories.map(dir => `**/${dir}/**`);
}
