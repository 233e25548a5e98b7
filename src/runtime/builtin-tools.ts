/**
 * Built-in tools registered by the governor runtime. Whether any of them may
 * run is decided by the capability policy, not here.
 */
import { promises as fs } from 'fs';
import { ToolRegistry } from '../execution/tool-registry';
import { MetricSample } from '../sampler/types';

const MAX_READ_BYTES = 256 * 1024;

function requireString(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Argument '${name}' must be a non-empty string`);
  }
  return value;
}

export function registerBuiltinTools(
  registry: ToolRegistry,
  latestSample: () => MetricSample | undefined,
): ToolRegistry {
  return registry
    .register('read_file', 'Read a UTF-8 text file (first 256 KiB)', async (args) => {
      const path = requireString(args, 'path');
      const handle = await fs.open(path, 'r');
      try {
        const buffer = Buffer.alloc(MAX_READ_BYTES);
        const { bytesRead } = await handle.read(buffer, 0, MAX_READ_BYTES, 0);
        return buffer.subarray(0, bytesRead).toString('utf8');
      } finally {
        await handle.close();
      }
    })
    .register('list_directory', 'List the entries of a directory', async (args) => {
      const path = requireString(args, 'path');
      const entries = await fs.readdir(path, { withFileTypes: true });
      return entries.map((entry) => ({ name: entry.name, type: entry.isDirectory() ? 'directory' : 'file' }));
    })
    .register('system_metrics_snapshot', 'Report the latest resource readings', () => {
      const sample = latestSample();
      return sample ? { timestamp: sample.timestamp, readings: sample.readings } : { readings: {} };
    });
}
