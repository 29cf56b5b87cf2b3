/**
 * Growing Files Probe
 *
 * Watches a directory for partial files (browser downloads, sync temp
 * files). Active while any partial file is new or grew since the previous
 * sample; a partial file that stalls stops counting.
 */

import { promises as fsp } from 'fs';
import * as path from 'path';
import type { Probe } from '../types';
import { expandHome } from '../paths';

export interface GrowingFilesProbeConfig {
  directory: string;
  /** Partial-file extensions, with or without the leading dot */
  extensions: string[];
}

function normalizeExtension(ext: string): string {
  return (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase();
}

export function createGrowingFilesProbe(config: GrowingFilesProbeConfig): Probe {
  const directory = expandHome(config.directory);
  const extensions = new Set(config.extensions.map(normalizeExtension));
  let previousSizes = new Map<string, number>();

  const probe: Probe = async () => {
    let entries: string[];
    try {
      entries = await fsp.readdir(directory);
    } catch {
      return { status: 'inactive', detail: 'directory unreadable' };
    }

    const partials = entries.filter((name) => extensions.has(path.extname(name).toLowerCase()));
    if (partials.length === 0) {
      previousSizes = new Map();
      return { status: 'inactive' };
    }

    const currentSizes = new Map<string, number>();
    let growing: string | null = null;

    for (const name of partials) {
      let size: number;
      try {
        size = (await fsp.stat(path.join(directory, name))).size;
      } catch {
        // Finished or removed between readdir and stat
        continue;
      }
      currentSizes.set(name, size);

      // A file seen for the first time gets the benefit of the doubt;
      // the next sample confirms whether it is really growing.
      const previous = previousSizes.get(name);
      if (growing === null && (previous === undefined || size > previous)) {
        growing = name;
      }
    }

    previousSizes = currentSizes;
    if (growing === null) {
      return { status: 'inactive', detail: 'stalled' };
    }
    return { status: 'active', detail: growing };
  };

  probe.reset = () => {
    previousSizes = new Map();
  };
  return probe;
}
