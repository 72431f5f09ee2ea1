import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string().min(1) });

export function readVersion(): string {
  const packagePath = fileURLToPath(new URL('../package.json', import.meta.url));
  const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf8'));
  return PackageJsonSchema.parse(parsed).version;
}
