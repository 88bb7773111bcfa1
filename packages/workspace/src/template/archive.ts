import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { fileURLToPath } from 'url';
import { x as extract } from 'tar';
import { HttpError, ProvisionError, errorMessage } from '@examplecheck/shared';

/**
 * Names a versioned project skeleton. `urlTemplate` may contain `{version}`.
 */
export interface TemplateArchiveRef {
  urlTemplate: string;
  version: string;
}

export function resolveArchiveUrl(ref: TemplateArchiveRef): string {
  return ref.urlTemplate.replaceAll('{version}', ref.version);
}

function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

function localArchivePath(location: string): string {
  return location.startsWith('file:') ? fileURLToPath(location) : path.resolve(location);
}

/**
 * Opens the archive as a byte stream: over HTTP(S) for remote locations,
 * from disk for `file:` URLs and plain paths.
 */
export async function openArchive(location: string): Promise<Readable> {
  if (!isRemote(location)) {
    const archivePath = localArchivePath(location);
    try {
      await fs.access(archivePath);
    } catch (error) {
      throw new ProvisionError(`Template archive not found: ${archivePath}`, { cause: error });
    }
    return createReadStream(archivePath);
  }

  let response: Response;
  try {
    response = await fetch(location, { redirect: 'follow' });
  } catch (error) {
    throw new HttpError(`Failed to download template archive from ${location}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new HttpError(
      `Template archive request failed with status ${response.status}: ${location}`,
      { status: response.status },
    );
  }
  if (!response.body) {
    throw new HttpError(`Template archive response has no body: ${location}`, {
      status: response.status,
    });
  }

  return Readable.fromWeb(response.body);
}

/**
 * Extracts a (optionally gzipped) tar stream into `destDir`, dropping the
 * first `strip` path components of every entry. Strict: warnings such as a
 * truncated or unrecognised archive fail the extraction.
 */
export function extractArchive(source: Readable, destDir: string, strip: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const unpack = extract({ cwd: destDir, strip, strict: true });

    // The first rejection wins; aborting the unpacker emits an error of its own.
    source.on('error', (error) => {
      reject(new HttpError(`Template archive stream failed: ${error.message}`, { cause: error }));
      unpack.abort(error);
    });
    unpack.on('error', (error: unknown) => {
      source.destroy();
      reject(
        new ProvisionError(`Failed to extract template archive: ${errorMessage(error)}`, {
          cause: error,
        }),
      );
    });
    unpack.once('close', () => resolve());

    source.pipe(unpack);
  });
}

/**
 * Downloads (or reads) the template archive and unpacks it into `destDir`.
 *
 * @returns the resolved archive location
 */
export async function fetchTemplate(
  ref: TemplateArchiveRef,
  destDir: string,
  strip = 1,
): Promise<string> {
  const location = resolveArchiveUrl(ref);
  await extractArchive(await openArchive(location), destDir, strip);
  return location;
}
