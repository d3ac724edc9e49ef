import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});

/** Name and version from package.json; same relative path from src/ and dist/. */
export function readPackageInfo(): { name: string; version: string } {
  const file = path.resolve(__dirname, '../../package.json');
  return PackageJsonSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
}
