import { promises as fs } from 'node:fs';
import path from 'node:path';
import { tmpdir } from 'node:os';

import type { OutputPort } from '../src/core/ports/output.js';
import type { PackageDescriptor } from '../src/types/index.js';

export type OutputLevel = 'info' | 'step' | 'message' | 'success' | 'alert';

export interface RecordedOutput {
  level: OutputLevel;
  message: string;
}

/**
 * Create a project directory under the OS temp dir. The returned path is
 * symlink-free so it compares equal to paths the code realpath()s.
 */
export async function createTempProject(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(tmpdir(), `volcano-installer-${prefix}-`));
  return fs.realpath(dir);
}

export async function removeTempProject(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
}

/**
 * OutputPort that records every call instead of printing. Alert blocks are
 * recorded joined with newlines.
 */
export function createRecordingOutput(): { output: OutputPort; records: RecordedOutput[] } {
  const records: RecordedOutput[] = [];
  const record = (level: OutputLevel) => (message: string): void => {
    records.push({ level, message });
  };

  return {
    records,
    output: {
      info: record('info'),
      step: record('step'),
      message: record('message'),
      success: record('success'),
      alert: (lines: readonly string[]) => record('alert')(lines.join('\n'))
    }
  };
}

export function pluginPackage(name: string, psr4: Record<string, string | string[]>): PackageDescriptor {
  return {
    name,
    type: 'volcano-package',
    version: '1.0.0',
    autoload: { 'psr-4': psr4 }
  };
}
