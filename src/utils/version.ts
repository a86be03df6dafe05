/**
 * Verze balíčku - načtená z package.json.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

function loadVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    // Ze src/utils i dist/utils je package.json o 2 úrovně výš
    const packageJson: unknown = JSON.parse(readFileSync(resolve(here, '../../package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const version = loadVersion();
