import * as fs from 'fs';
import * as path from 'path';

interface PackageManifest {
  version?: unknown;
}

/**
 * Version from package.json; resolved the same way from src/ and dist/.
 */
export function getVersion(): string {
  const manifestPath = path.join(__dirname, '../../package.json');
  const manifest: PackageManifest = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
  return typeof manifest.version === 'string' ? manifest.version : '0.0.0';
}

export function handleVersionCommand(): void {
  process.stdout.write(`unpackit ${getVersion()}\n`);
}
