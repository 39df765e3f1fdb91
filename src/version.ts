/**
 * Package version, read from package.json
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

// src/ and dist/ both sit one level below package.json
const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../package.json');

export const VERSION: string = packageJsonSchema.parse(
  JSON.parse(readFileSync(packageJsonPath, 'utf-8'))
).version;
