import {existsSync} from 'node:fs';
import path from 'node:path';
import {config as loadEnvironment} from 'dotenv';

const environmentCandidates = ['.env', '.dev.vars', '../../.env'];

export function loadEnvironmentFiles(cwd = process.cwd()): void {
  for (const candidate of environmentCandidates) {
    const resolvedPath = path.resolve(cwd, candidate);
    if (existsSync(resolvedPath)) {
      loadEnvironment({path: resolvedPath, override: false});
    }
  }
}
