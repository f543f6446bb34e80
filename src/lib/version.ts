// src/lib/version.ts
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageSchema = z.object({ name: z.string(), version: z.string() });

/** Nearest package.json above this module, whether run from sources or dist/. */
function readVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const file = path.join(dir, 'package.json');
    if (fs.existsSync(file)) {
      const pkg = PackageSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
      if (pkg.success && pkg.data.name === 'deskbar-daemon') return pkg.data.version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

export const VERSION = readVersion();
