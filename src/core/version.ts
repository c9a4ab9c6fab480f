import { readFileSync } from 'fs';
import { join } from 'path';

export const TOOL_NAME = 'opguard';

function readPackageVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
  return typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';
}

/** Version from package.json, shared by `--version` and every report. */
export const TOOL_VERSION = readPackageVersion();
