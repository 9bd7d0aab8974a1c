// src/version.ts - Package metadata read from package.json at runtime
import * as fs from 'fs/promises';
import { z } from 'zod';

const PackageJson = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});
export type PackageInfo = z.infer<typeof PackageJson>;

// Resolves to the package root from both src/ and dist/
const packageJsonPath = new URL('../package.json', import.meta.url);

export const packageInfo: PackageInfo = PackageJson.parse(JSON.parse(await fs.readFile(packageJsonPath, 'utf8')));

/** Value of the `X-Generator` catalog header */
export const GENERATOR = `mdpo ${packageInfo.version}`;
