import * as fs from 'fs/promises';
import path from 'path';
import { PreconditionError, type ExampleOrder } from '@examplecheck/shared';

/**
 * One example source unit. `name` is what the build tool's `--example` takes.
 */
export interface ExampleUnit {
  name: string;
  fileName: string;
  path: string;
}

/**
 * Read-only view of the examples to verify, in run order.
 */
export interface ExampleSet {
  list(): Promise<ExampleUnit[]>;
}

/**
 * Strips the last extension: `blink.rs` → `blink`, `uart` → `uart`.
 */
export function exampleName(fileName: string): string {
  const ext = path.extname(fileName);
  return ext ? fileName.slice(0, -ext.length) : fileName;
}

/**
 * Examples taken from the entries directly under a directory. Hidden entries
 * are skipped and a name that appears twice is checked once.
 */
export class DirectoryExampleSet implements ExampleSet {
  constructor(
    private readonly dir: string,
    private readonly order: ExampleOrder = 'lexicographic',
  ) {}

  async list(): Promise<ExampleUnit[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      throw new PreconditionError(`Cannot read examples directory ${this.dir}`, { cause: error });
    }

    const visible = entries.filter((entry) => !entry.startsWith('.'));
    if (this.order === 'lexicographic') {
      // Code-unit order, independent of locale.
      visible.sort();
    }

    const seen = new Set<string>();
    const units: ExampleUnit[] = [];
    for (const fileName of visible) {
      const name = exampleName(fileName);
      if (seen.has(name)) continue;
      seen.add(name);
      units.push({ name, fileName, path: path.join(this.dir, fileName) });
    }
    return units;
  }
}
