import * as fs from 'fs/promises';
import * as path from 'path';
import { c as createTar } from 'tar';

/**
 * Files of a miniature project skeleton, keyed by path relative to its root.
 */
export const TEMPLATE_FILES: Record<string, string> = {
  'Cargo.toml': [
    '[package]',
    'name = "quickstart"',
    'version = "0.1.8"',
    '',
    '[dependencies]',
    'cortex-m = "0.3.0"',
    '',
    '[profile.release]',
    'lto = true',
    '',
  ].join('\n'),
  'README.md': '# quickstart\n',
  '.cargo/config': '[build]\ntarget = "thumbv7m-none-eabi"\n',
  'build.rs': 'fn main() {}\n',
  'memory.x': 'MEMORY { FLASH : ORIGIN = 0x08000000, LENGTH = 64K }\n',
  'src/main.rs': '#![no_std]\n',
  'examples/hello.rs': '// template example\n',
};

/**
 * Writes `files` under `root`, creating directories as needed.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  }
}

/**
 * Builds a gzipped tarball whose entries sit under a single wrapper directory,
 * the way source archives of tagged releases are laid out.
 */
export async function buildTemplateArchive(
  workDir: string,
  wrapper = 'quickstart-0.1.8',
  files: Record<string, string> = TEMPLATE_FILES,
): Promise<string> {
  const staging = path.join(workDir, 'staging');
  await writeTree(path.join(staging, wrapper), files);
  const archivePath = path.join(workDir, `${wrapper}.tar.gz`);
  await createTar({ gzip: true, file: archivePath, cwd: staging }, [wrapper]);
  return archivePath;
}
