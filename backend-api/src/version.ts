import { createRequire } from 'node:module';
import { z } from 'zod';

// The backend is built as ESM; JSON imports would need import attributes,
// so package.json is read through createRequire.
const require = createRequire(import.meta.url);

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const parsed = packageJsonSchema.safeParse(require('../package.json'));
  return parsed.success ? parsed.data.version : '0.0.0';
}

export const backendVersion = readVersion();
