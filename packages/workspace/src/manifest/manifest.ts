import * as fs from 'fs/promises';
import { parse, stringify } from 'smol-toml';
import { ManifestError, atomicWrite, errorMessage } from '@examplecheck/shared';

/** Where a dependency is resolved from */
export type DependencySource = { path: string } | { version: string };

export type AddDependencyResult = 'added' | 'unchanged';

type TomlTable = Record<string, unknown>;

function isTable(value: unknown): value is TomlTable {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function sameSource(existing: unknown, source: DependencySource): boolean {
  if ('path' in source) {
    return isTable(existing) && existing.path === source.path;
  }
  if (typeof existing === 'string') {
    return existing === source.version;
  }
  return isTable(existing) && existing.version === source.version && existing.path === undefined;
}

/**
 * A Cargo manifest held as a TOML table. Dependencies are only ever added:
 * re-adding an identical entry is a no-op and a conflicting one is an error.
 */
export class CargoManifest {
  private constructor(
    private readonly document: TomlTable,
    readonly filePath?: string,
  ) {}

  static parse(content: string, filePath?: string): CargoManifest {
    const where = filePath ? ` ${filePath}` : '';
    let document: TomlTable;
    try {
      document = parse(content);
    } catch (error) {
      throw new ManifestError(`Failed to parse manifest${where}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (document.dependencies !== undefined && !isTable(document.dependencies)) {
      throw new ManifestError(`Manifest${where} has a "dependencies" key that is not a table.`);
    }
    return new CargoManifest(document, filePath);
  }

  static async load(filePath: string): Promise<CargoManifest> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new ManifestError(`Failed to read manifest ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return CargoManifest.parse(content, filePath);
  }

  /** `[package].name`, when present */
  get packageName(): string | undefined {
    const pkg = this.document.package;
    return isTable(pkg) && typeof pkg.name === 'string' ? pkg.name : undefined;
  }

  getDependency(name: string): unknown {
    const deps = this.document.dependencies;
    return isTable(deps) ? deps[name] : undefined;
  }

  addDependency(name: string, source: DependencySource): AddDependencyResult {
    const deps = this.dependencyTable();
    const existing = deps[name];

    if (existing === undefined) {
      deps[name] = { ...source };
      return 'added';
    }
    if (sameSource(existing, source)) {
      return 'unchanged';
    }
    throw new ManifestError(`Manifest already declares dependency "${name}" with a different source.`, {
      details: { name, existing, requested: source },
    });
  }

  /** The document as a plain TOML table */
  toJSON(): TomlTable {
    return structuredClone(this.document);
  }

  toString(): string {
    return stringify(this.document);
  }

  async save(filePath: string | undefined = this.filePath): Promise<void> {
    if (!filePath) {
      throw new ManifestError('Cannot save a manifest that was not loaded from a file.');
    }
    await atomicWrite(filePath, this.toString() + '\n');
  }

  private dependencyTable(): TomlTable {
    const deps = this.document.dependencies;
    if (isTable(deps)) {
      return deps;
    }
    const created: TomlTable = {};
    this.document.dependencies = created;
    return created;
  }
}
