import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

let cached: string | undefined;

/**
 * Version from package.json, read at runtime. The path is the same from
 * src/cli and dist/cli.
 */
export function getVersion(): string {
  if (cached === undefined) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
    );
    cached = PackageJsonSchema.parse(raw).version;
  }
  return cached;
}
