import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const APP_NAME = 'healthscore';

export function getDataRoot(): string {
  const platform = os.platform();

  if (process.env['XDG_DATA_HOME']) {
    return path.join(process.env['XDG_DATA_HOME'], APP_NAME);
  }

  switch (platform) {
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', APP_NAME);
    case 'win32':
      return path.join(process.env['LOCALAPPDATA'] ?? os.homedir(), APP_NAME, 'data');
    default:
      return path.join(os.homedir(), '.local', 'share', APP_NAME);
  }
}

export interface DataLayout {
  root: string;
  payloads: string; // stored webhook payloads
  output: string; // orchestrator output root
  charts: string;
  reports: string;
}

export function getDataLayout(dataDir: string): DataLayout {
  const root = path.resolve(dataDir);
  const output = path.join(root, 'output');
  return {
    root,
    payloads: path.join(root, 'payloads'),
    output,
    charts: path.join(output, 'charts'),
    reports: path.join(output, 'reports'),
  };
}

// Walk up from this module until a package.json shows up; works from src/ and
// from the bundled dist/ alike
export function findPackageRoot(from: string = path.dirname(fileURLToPath(import.meta.url))): string {
  let dir = from;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${from}`);
    }
    dir = parent;
  }
  return dir;
}

export function getDefaultScoringTablePath(): string {
  return path.join(findPackageRoot(), 'data', 'scoring-table.json');
}

/**
 * True when `target` resolves to a location inside `root` (or is `root`).
 */
export function isInside(root: string, target: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}
