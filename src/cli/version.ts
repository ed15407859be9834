import fs from 'fs';
import path from 'path';

/**
 * Version from the package manifest two levels above this module, which is
 * the project root from both `src/cli` and `dist/cli`.
 *
 * @throws {Error} If package.json is missing or has no version string
 */
export function readPackageVersion(
  manifestPath: string = path.join(__dirname, '..', '..', 'package.json')
): string {
  const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  throw new Error(`${manifestPath} has no version`);
}
